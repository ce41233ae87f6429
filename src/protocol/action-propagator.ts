import type { KadAction } from "./kad-action";

/**
 * Sends actions to the peers they are addressed to. Fire and forget: nothing
 * is returned, delivery is neither confirmed nor guaranteed.
 */
export interface ActionPropagator {
  propagateActions(actions: KadAction[]): void;
}
