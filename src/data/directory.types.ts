import type { z } from "zod";
import type {
  DirectorySnapshotSchema,
  GroupSchema,
  MemberSchema,
  OrganizationSchema,
  TeamRoleSchema,
  TeamSchema,
} from "./directory.schema.js";

export type TeamRole = z.infer<typeof TeamRoleSchema>;
export type Organization = z.infer<typeof OrganizationSchema>;
export type Group = z.infer<typeof GroupSchema>;
export type Team = z.infer<typeof TeamSchema>;
export type Member = z.infer<typeof MemberSchema>;
export type DirectorySnapshot = z.infer<typeof DirectorySnapshotSchema>;

/**
 * Read-only view of the organization directory.
 * Lookups resolve to `null` when the entity does not exist.
 */
export interface DirectoryRepository {
  getMemberByEmail(email: string): Promise<Member | null>;
  getMemberByName(name: string): Promise<Member | null>;
  getTeam(id: string): Promise<Team | null>;
  getGroup(id: string): Promise<Group | null>;
  getOrganization(id: string): Promise<Organization | null>;
  listOrganizations(limit: number): Promise<Organization[]>;
  listGroupsByOrganization(organizationId: string, limit: number): Promise<Group[]>;
  listTeamsByGroup(groupId: string, limit: number): Promise<Team[]>;
}

export const DIRECTORY_REPOSITORY = Symbol("DIRECTORY_REPOSITORY");
