export { KBucket } from "./k-bucket";
export type { KBucketOptions } from "./k-bucket";
export type { NodeDataProvider } from "./node-data-provider";
export { RoutingTable } from "./routing-table";
export type { RoutingTableOptions } from "./routing-table";
