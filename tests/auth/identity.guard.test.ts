import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host.js";
import { describe, expect, it } from "vitest";
import { IdentityGuard } from "../../src/auth/identity.guard.js";
import type { CallerIdentity } from "../../src/auth/identity.types.js";
import { parseForwardedIdentity, toCallerIdentity } from "../../src/auth/identity.utils.js";
import { MemberNotFoundError, UnauthenticatedError } from "../../src/errors/index.js";
import { createDirectory } from "../helpers.js";

const directory = createDirectory({
  members: [
    {
      id: "u-1",
      name: "alex",
      email: "alex@example.com",
      teamId: "team-1",
      teamRole: "scm",
      metadata: { member_of: "team-z" },
    },
    { id: "u-2", name: "sam", email: "sam@example.com", teamId: null, teamRole: "member", metadata: null },
  ],
});

interface FakeRequest {
  headers: Record<string, string | string[] | undefined>;
  identity?: CallerIdentity;
}

async function activate(headers: FakeRequest["headers"]): Promise<FakeRequest> {
  const request: FakeRequest = { headers };
  await new IdentityGuard(directory).canActivate(new ExecutionContextHost([request, {}]));
  return request;
}

describe("parseForwardedIdentity", () => {
  it("should read and trim both headers", () => {
    expect(
      parseForwardedIdentity({ "x-forwarded-email": " alex@example.com ", "x-forwarded-user": "alex" }),
    ).toEqual({ email: "alex@example.com", username: "alex" });
  });

  it("should take the first value of a repeated header", () => {
    expect(parseForwardedIdentity({ "x-forwarded-user": ["sam", "alex"] })).toEqual({
      email: undefined,
      username: "sam",
    });
  });

  it("should return null when both headers are missing or blank", () => {
    expect(parseForwardedIdentity({ "x-forwarded-email": "  " })).toBeNull();
  });
});

describe("toCallerIdentity", () => {
  it("should carry the member_of metadata as free-form tags", () => {
    expect(
      toCallerIdentity({
        id: "u-3",
        name: "riley",
        email: "riley@example.com",
        teamId: "team-3",
        teamRole: "mmm",
        metadata: { member_of: ["team-a", 1], other: true },
      }),
    ).toEqual({
      username: "riley",
      email: "riley@example.com",
      teamId: "team-3",
      teamRole: "mmm",
      freeFormTags: ["team-a", 1],
    });
  });
});

describe("IdentityGuard", () => {
  it("should attach the identity found by email", async () => {
    const request = await activate({ "x-forwarded-email": "alex@example.com", "x-forwarded-user": "someone-else" });

    expect(request.identity).toEqual({
      username: "alex",
      email: "alex@example.com",
      teamId: "team-1",
      teamRole: "scm",
      freeFormTags: "team-z",
    });
  });

  it("should fall back to the username", async () => {
    const request = await activate({ "x-forwarded-user": "sam" });

    expect(request.identity?.teamId).toBeNull();
    expect(request.identity?.freeFormTags).toBeUndefined();
  });

  it("should reject a request without identity headers", async () => {
    await expect(activate({})).rejects.toBeInstanceOf(UnauthenticatedError);
  });

  it("should reject a caller missing from the directory", async () => {
    await expect(activate({ "x-forwarded-email": "ghost@example.com" })).rejects.toThrow(
      new MemberNotFoundError("ghost@example.com"),
    );
  });
});
