import type { Member } from "../data/directory.types.js";
import type { CallerIdentity, ForwardedIdentity } from "./identity.types.js";

export const MEMBER_OF_METADATA_KEY = "member_of";

type HeaderValue = string | string[] | undefined;

function firstHeader(value: HeaderValue): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read the identity headers set by the authenticating reverse proxy
 */
export function parseForwardedIdentity(headers: Record<string, HeaderValue>): ForwardedIdentity | null {
  const email = firstHeader(headers["x-forwarded-email"]);
  const username = firstHeader(headers["x-forwarded-user"]);
  if (!email && !username) return null;
  return { email, username };
}

export function toCallerIdentity(member: Member): CallerIdentity {
  return {
    username: member.name,
    email: member.email,
    teamId: member.teamId,
    teamRole: member.teamRole,
    freeFormTags: member.metadata?.[MEMBER_OF_METADATA_KEY],
  };
}
