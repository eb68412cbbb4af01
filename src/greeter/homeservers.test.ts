import { describe, expect, it } from "vitest";

import { formatHomeserverStatus, resolveHomeserverApproval } from "./homeservers.js";

describe("resolveHomeserverApproval", () => {
  it("is unchecked without an allow-list", () => {
    expect(resolveHomeserverApproval({ userId: "@alice:example.org" })).toBe("unchecked");
    expect(resolveHomeserverApproval({ userId: "@alice:example.org", allowList: [] })).toBe(
      "unchecked",
    );
  });

  it("allows listed homeservers regardless of case", () => {
    expect(
      resolveHomeserverApproval({ userId: "@alice:Example.ORG", allowList: ["example.org"] }),
    ).toBe("allowed");
  });

  it("rejects homeservers outside the list", () => {
    expect(resolveHomeserverApproval({ userId: "@bob:other.org", allowList: ["example.org"] })).toBe(
      "not-allowed",
    );
  });

  it("accepts everyone with a wildcard entry", () => {
    expect(resolveHomeserverApproval({ userId: "@bob:other.org", allowList: ["*"] })).toBe("allowed");
  });

  it("rejects malformed user IDs when a list is configured", () => {
    expect(resolveHomeserverApproval({ userId: "bob", allowList: ["example.org"] })).toBe(
      "not-allowed",
    );
  });
});

describe("formatHomeserverStatus", () => {
  it("renders each approval for templates", () => {
    expect(formatHomeserverStatus("allowed")).toBe("allowed");
    expect(formatHomeserverStatus("not-allowed")).toBe("not allowed");
    expect(formatHomeserverStatus("unchecked")).toBe("unchecked");
  });
});
