import type { TeamRole } from "../data/directory.types.js";

/**
 * Who is calling, as established by the authentication proxy and the directory.
 */
export interface CallerIdentity {
  username: string;
  email: string;
  teamId: string | null;
  teamRole: TeamRole;
  /** Raw `metadata.member_of` value: a string, a string array, or a mixed array */
  freeFormTags: unknown;
}

export interface ForwardedIdentity {
  email?: string;
  username?: string;
}
