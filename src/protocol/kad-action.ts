import type { PeerAddress } from "../core";
import { MalformedActionError } from "../errors/kademlia-errors";

/**
 * What an action asks for, or answers to.
 */
export enum ActionType {
  FIND_NODE = "FIND_NODE",
  FIND_NODE_ANSWER = "FIND_NODE_ANSWER",
  FIND_VALUE = "FIND_VALUE",
  FIND_VALUE_ANSWER = "FIND_VALUE_ANSWER",
  INVITE = "INVITE",
  INVITE_ANSWER = "INVITE_ANSWER",
}

/**
 * How the payload of an action must be read.
 */
export enum PayloadType {
  // A key in hex, the target of a find request
  KEY = "KEY",
  // A "host:port" address
  PEER_ADDRESS = "PEER_ADDRESS",
  // A serialized StringResource
  RESOURCE = "RESOURCE",
  // "true" or "false"
  BOOLEAN = "BOOLEAN",
  IGNORED = "IGNORED",
}

/**
 * Separates the header fields of an encoded action. The payload is always
 * the last field and may contain anything, this character included.
 */
export const FIELD_SEPARATOR = "\n" as const;

const HEADER_FIELDS = 5;

export type KadActionInit = {
  /**
   * Destination of an outgoing action, sender of an inbound one.
   */
  peer: PeerAddress;
  actionType: ActionType;
  operationId: number;
  payloadType: PayloadType;
  payload: string;
  /**
   * 1-based index of this fragment, defaults to 1
   */
  currentPart?: number;
  /**
   * How many fragments the answer to one request is split into, defaults to 1
   */
  totalParts?: number;
};

function isEnumValue<T extends string>(
  values: Record<string, T>,
  candidate: string,
): candidate is T {
  return Object.values<string>(values).includes(candidate);
}

function parseCount(field: string, name: string): number {
  const value = Number(field);
  if (!/^\d+$/.test(field) || !Number.isSafeInteger(value)) {
    throw new MalformedActionError(`${name} "${field}" is not a number`);
  }
  return value;
}

/**
 * A protocol message. Every action belongs to exactly one operation.
 */
export class KadAction {
  readonly peer: PeerAddress;
  readonly actionType: ActionType;
  readonly operationId: number;
  readonly payloadType: PayloadType;
  readonly payload: string;
  readonly currentPart: number;
  readonly totalParts: number;

  constructor(init: KadActionInit) {
    const currentPart = init.currentPart ?? 1;
    const totalParts = init.totalParts ?? 1;

    if (!Number.isSafeInteger(init.operationId) || init.operationId < 0) {
      throw new MalformedActionError(
        `operation id ${init.operationId} must be a non-negative integer`,
      );
    }
    if (!Number.isInteger(totalParts) || totalParts < 1) {
      throw new MalformedActionError(`total parts ${totalParts} must be >= 1`);
    }
    if (
      !Number.isInteger(currentPart) ||
      currentPart < 1 ||
      currentPart > totalParts
    ) {
      throw new MalformedActionError(
        `part ${currentPart} is outside 1..${totalParts}`,
      );
    }

    this.peer = init.peer;
    this.actionType = init.actionType;
    this.operationId = init.operationId;
    this.payloadType = init.payloadType;
    this.payload = init.payload;
    this.currentPart = currentPart;
    this.totalParts = totalParts;
  }

  /**
   * Decode an action received from `peer`.
   * @throws MalformedActionError if the text is not a valid encoding
   */
  static parse(peer: PeerAddress, text: string): KadAction {
    const fields: string[] = [];
    let rest = text;
    for (let i = 0; i < HEADER_FIELDS; i++) {
      const index = rest.indexOf(FIELD_SEPARATOR);
      if (index === -1) {
        throw new MalformedActionError(
          `expected ${HEADER_FIELDS + 1} fields, got ${fields.length + 1}`,
        );
      }
      fields.push(rest.slice(0, index));
      rest = rest.slice(index + 1);
    }

    const [actionType, operationId, currentPart, totalParts, payloadType] =
      fields;

    if (!isEnumValue(ActionType, actionType)) {
      throw new MalformedActionError(`unknown action type "${actionType}"`);
    }
    if (!isEnumValue(PayloadType, payloadType)) {
      throw new MalformedActionError(`unknown payload type "${payloadType}"`);
    }

    return new KadAction({
      peer,
      actionType,
      operationId: parseCount(operationId, "operation id"),
      currentPart: parseCount(currentPart, "current part"),
      totalParts: parseCount(totalParts, "total parts"),
      payloadType,
      payload: rest,
    });
  }

  /**
   * Encode the action for the wire. The peer address is not part of the
   * text: it travels as the transport's own addressing.
   */
  toString(): string {
    return [
      this.actionType,
      String(this.operationId),
      String(this.currentPart),
      String(this.totalParts),
      this.payloadType,
      this.payload,
    ].join(FIELD_SEPARATOR);
  }
}
