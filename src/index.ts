export * from "./core";
export * from "./errors/kademlia-errors";
export * from "./protocol";
export * from "./requests";
export * from "./routing";
