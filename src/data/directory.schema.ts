import { z } from "zod";

export const TeamRoleSchema = z.enum(["member", "scm", "manager", "mmm"]);

export const OrganizationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  owner: z.string(),
});

export const GroupSchema = z.object({
  id: z.string().min(1),
  organizationId: z.string().min(1),
  name: z.string().min(1),
  owner: z.string().default(""),
});

export const TeamSchema = z.object({
  id: z.string().min(1),
  groupId: z.string().min(1),
  name: z.string().min(1),
});

export const MemberSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: z.string().min(1),
  teamId: z.string().nullable().default(null),
  teamRole: TeamRoleSchema.default("member"),
  metadata: z.record(z.string(), z.unknown()).nullable().default(null),
});

export const DirectorySnapshotSchema = z.object({
  organizations: z.array(OrganizationSchema).default([]),
  groups: z.array(GroupSchema).default([]),
  teams: z.array(TeamSchema).default([]),
  members: z.array(MemberSchema).default([]),
});
