import { describe, expect, it } from "vitest";
import { MalformedActionError } from "../errors/kademlia-errors";
import { ActionType, KadAction, PayloadType } from "./kad-action";

describe("KadAction", () => {
  describe("construction", () => {
    it("should default to a single part", () => {
      // WHEN
      const action = new KadAction({
        peer: "10.0.0.1:4000",
        actionType: ActionType.FIND_VALUE,
        operationId: 7,
        payloadType: PayloadType.KEY,
        payload: "abc",
      });

      // THEN
      expect(action.currentPart).toBe(1);
      expect(action.totalParts).toBe(1);
    });

    it("should reject a part count below one", () => {
      expect(
        () =>
          new KadAction({
            peer: "10.0.0.1:4000",
            actionType: ActionType.FIND_VALUE_ANSWER,
            operationId: 7,
            payloadType: PayloadType.PEER_ADDRESS,
            payload: "10.0.0.2:4000",
            totalParts: 0,
          }),
      ).toThrow(MalformedActionError);
    });

    it("should reject a part index beyond the part count", () => {
      expect(
        () =>
          new KadAction({
            peer: "10.0.0.1:4000",
            actionType: ActionType.FIND_VALUE_ANSWER,
            operationId: 7,
            payloadType: PayloadType.PEER_ADDRESS,
            payload: "10.0.0.2:4000",
            currentPart: 3,
            totalParts: 2,
          }),
      ).toThrow(MalformedActionError);
    });

    it("should reject negative operation ids", () => {
      expect(
        () =>
          new KadAction({
            peer: "10.0.0.1:4000",
            actionType: ActionType.INVITE,
            operationId: -1,
            payloadType: PayloadType.IGNORED,
            payload: "",
          }),
      ).toThrow(MalformedActionError);
    });
  });

  describe("encoding", () => {
    it("should join the header fields and the payload with newlines", () => {
      // GIVEN
      const action = new KadAction({
        peer: "10.0.0.1:4000",
        actionType: ActionType.FIND_VALUE,
        operationId: 7,
        payloadType: PayloadType.KEY,
        payload: "abc",
      });

      // THEN
      expect(action.toString()).toBe("FIND_VALUE\n7\n1\n1\nKEY\nabc");
    });

    it("should keep separators that appear inside the payload", () => {
      // WHEN
      const action = KadAction.parse(
        "10.0.0.9:4000",
        "FIND_VALUE_ANSWER\n3\n2\n3\nRESOURCE\nname\rvalue\nmore",
      );

      // THEN
      expect(action.peer).toBe("10.0.0.9:4000");
      expect(action.actionType).toBe(ActionType.FIND_VALUE_ANSWER);
      expect(action.operationId).toBe(3);
      expect(action.currentPart).toBe(2);
      expect(action.totalParts).toBe(3);
      expect(action.payloadType).toBe(PayloadType.RESOURCE);
      expect(action.payload).toBe("name\rvalue\nmore");
    });

    it("should decode what it encodes", () => {
      // GIVEN
      const action = new KadAction({
        peer: "10.0.0.1:4000",
        actionType: ActionType.FIND_NODE_ANSWER,
        operationId: 12,
        payloadType: PayloadType.PEER_ADDRESS,
        payload: "10.0.0.2:4000",
        currentPart: 2,
        totalParts: 4,
      });

      // WHEN
      const decoded = KadAction.parse(action.peer, action.toString());

      // THEN
      expect(decoded).toEqual(action);
    });

    it.each([
      ["too few fields", "FIND_VALUE\n7\n1\n1"],
      ["an unknown action", "PING\n7\n1\n1\nKEY\nabc"],
      ["an unknown payload", "FIND_VALUE\n7\n1\n1\nBLOB\nabc"],
      ["a non numeric id", "FIND_VALUE\nseven\n1\n1\nKEY\nabc"],
      ["zero parts", "FIND_VALUE\n7\n1\n0\nKEY\nabc"],
      [
        "an id no number can hold exactly",
        "FIND_VALUE\n9007199254740993\n1\n1\nKEY\nabc",
      ],
    ])("should reject %s", (_label, text) => {
      expect(() => KadAction.parse("10.0.0.1:4000", text)).toThrow(
        MalformedActionError,
      );
    });
  });
});
