import { NodeId } from "./arena";
import { createTriggerNode } from "./node";
import { assertWritable } from "./propagation";
import { getNode, lookupNode } from "./runtime";
import { notify } from "./scheduler";
import { allocateNode, requireScope } from "./scope";
import { trackRead } from "./tracker";

/**
 * A node without a value, for changes that happen outside of signals.
 */
export interface Trigger {
  readonly id: NodeId;
  track(): void;
  notify(): void;
  tryTrack(): boolean;
  tryNotify(): boolean;
}

export const createTrigger = (): Trigger => {
  const scope = requireScope("createTrigger");
  const { runtime } = scope;
  const id = allocateNode(scope, createTriggerNode);
  const track = () => {
    getNode(runtime, id);
    trackRead(runtime, id);
  };
  const notifyTrigger = () => {
    getNode(runtime, id);
    assertWritable(runtime, id);
    notify(runtime, id);
  };
  return {
    id,
    track,
    notify: notifyTrigger,
    tryTrack: () => {
      if (!lookupNode(runtime, id)) {
        return false;
      }
      track();
      return true;
    },
    tryNotify: () => {
      if (!lookupNode(runtime, id)) {
        return false;
      }
      notifyTrigger();
      return true;
    },
  };
};
