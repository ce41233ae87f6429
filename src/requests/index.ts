export { FindNodePendingRequest } from "./find-node-pending-request";
export type { FindNodePendingRequestOptions } from "./find-node-pending-request";
export { FindValuePendingRequest } from "./find-value-pending-request";
export type { FindValuePendingRequestOptions } from "./find-value-pending-request";
export { InvitePendingRequest } from "./invite-pending-request";
export type { InvitePendingRequestOptions } from "./invite-pending-request";
export type {
  FindNodeResultListener,
  FindValueResultListener,
  InviteResultListener,
} from "./listeners";
export { LookupRounds, RoundStatus } from "./lookup-rounds";
export { RequestState, isTerminal } from "./pending-request";
export type { PendingRequest } from "./pending-request";
export { PendingRequestManager } from "./pending-request-manager";
export type {
  FindNodeResult,
  FindValueResult,
  PendingRequestFactory,
  PendingRequestManagerOptions,
} from "./pending-request-manager";
export { DEFAULT_K, DEFAULT_ROUND_TIMEOUT } from "./pending-request.constants";
