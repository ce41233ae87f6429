export type { ActionPropagator } from "./action-propagator";
export {
  ActionType,
  FIELD_SEPARATOR,
  KadAction,
  PayloadType,
} from "./kad-action";
export type { KadActionInit } from "./kad-action";
export { KadActionsBuilder } from "./kad-actions-builder";
export {
  BOOLEAN_FALSE,
  BOOLEAN_TRUE,
  RESOURCE_SEPARATOR,
} from "./protocol.constants";
export { StringResource } from "./string-resource";
