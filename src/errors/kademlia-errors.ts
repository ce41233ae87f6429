/**
 * Base class for all Kademlia-related errors
 */
export class KademliaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "KademliaError" as const;
  }
}

/**
 * Thrown when a key can't be built from the given input
 */
export class InvalidKeyError extends KademliaError {
  constructor(public readonly reason: string) {
    super(`Invalid key: ${reason}`);
    this.name = "InvalidKeyError" as const;
  }
}

/**
 * Thrown when a peer address is not of the form "host:port"
 */
export class InvalidAddressError extends KademliaError {
  constructor(public readonly address: string) {
    super(`Invalid peer address "${address}", expected host:port`);
    this.name = "InvalidAddressError" as const;
  }
}

/**
 * Thrown when an inbound message can't be decoded
 */
export class MalformedActionError extends KademliaError {
  constructor(public readonly reason: string) {
    super(`Malformed action: ${reason}`);
    this.name = "MalformedActionError" as const;
  }
}

/**
 * Thrown when a resource payload breaks its encoding, or a resource field
 * contains the reserved separator
 */
export class MalformedResourceError extends KademliaError {
  constructor(public readonly reason: string) {
    super(`Malformed resource: ${reason}`);
    this.name = "MalformedResourceError" as const;
  }
}

/**
 * Thrown when a pending request is driven from a state that doesn't allow it,
 * such as starting it twice
 */
export class RequestStateError extends KademliaError {
  constructor(
    public readonly operationId: number,
    public readonly state: string,
    public readonly operation: string,
  ) {
    super(`Cannot ${operation} request ${operationId} in state ${state}`);
    this.name = "RequestStateError" as const;
  }
}
