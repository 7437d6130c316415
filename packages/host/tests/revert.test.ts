/**
 * Tests for revert payload encoding.
 */

import { describe, it, expect } from "vitest";
import { CallReverted, ForwardedCallFailure, NotFoundError } from "@tessera/types";
import {
  encodeRevertReason,
  decodeRevertReason,
  describeRevert,
  toRevertData,
} from "../src/revert.js";

describe("encodeRevertReason", () => {
  it("uses the Error(string) selector", () => {
    expect(encodeRevertReason("nope").slice(0, 10)).toBe("0x08c379a0");
  });

  it("decodes back to the same reason", () => {
    expect(decodeRevertReason(encodeRevertReason("Insufficient funds"))).toBe(
      "Insufficient funds",
    );
  });
});

describe("decodeRevertReason", () => {
  it("returns undefined for empty data", () => {
    expect(decodeRevertReason("0x")).toBeUndefined();
  });

  it("returns undefined for a custom error payload", () => {
    expect(decodeRevertReason("0xdeadbeef")).toBeUndefined();
  });
});

describe("describeRevert", () => {
  it("prefers the decoded reason", () => {
    expect(describeRevert(encodeRevertReason("boom"))).toBe("boom");
  });

  it("falls back to the raw bytes", () => {
    expect(describeRevert("0xdeadbeef")).toBe("0xdeadbeef");
  });
});

describe("toRevertData", () => {
  it("passes CallReverted payloads through untouched", () => {
    expect(toRevertData(new CallReverted("0xcafe"))).toBe("0xcafe");
  });

  it("passes forwarded failures through untouched", () => {
    expect(toRevertData(new ForwardedCallFailure("inner", "0xbeef"))).toBe("0xbeef");
  });

  it("encodes other errors by message", () => {
    const data = toRevertData(new NotFoundError("Transaction 3 not found"));
    expect(decodeRevertReason(data)).toBe("Transaction 3 not found");
  });

  it("encodes non-error values as strings", () => {
    expect(decodeRevertReason(toRevertData("plain"))).toBe("plain");
  });
});
