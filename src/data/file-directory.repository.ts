import { readFile } from "node:fs/promises";
import { Injectable, Logger, type OnModuleInit } from "@nestjs/common";
import { formatZodError } from "../common/validation.utils.js";
import { ConfigService } from "../config/config.service.js";
import { DirectorySnapshotSchema } from "./directory.schema.js";
import type {
  DirectoryRepository,
  DirectorySnapshot,
  Group,
  Member,
  Organization,
  Team,
} from "./directory.types.js";

const EMPTY_SNAPSHOT: DirectorySnapshot = {
  organizations: [],
  groups: [],
  teams: [],
  members: [],
};

/**
 * Directory backed by a JSON snapshot exported from the portal database.
 */
@Injectable()
export class FileDirectoryRepository implements DirectoryRepository, OnModuleInit {
  private readonly logger = new Logger(FileDirectoryRepository.name);
  private snapshot: DirectorySnapshot = EMPTY_SNAPSHOT;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const filePath = this.configService.get("directoryFile");
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.warn(`Directory file ${filePath} not found, starting with an empty directory`);
        return;
      }
      throw error;
    }
    this.load(JSON.parse(raw));
    this.logger.log(
      `Loaded directory: ${String(this.snapshot.members.length)} members, ${String(this.snapshot.teams.length)} teams`,
    );
  }

  load(data: unknown): void {
    const parsed = DirectorySnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Invalid directory snapshot: ${formatZodError(parsed.error)}`);
    }
    this.snapshot = parsed.data;
  }

  async getMemberByEmail(email: string): Promise<Member | null> {
    const needle = email.toLowerCase();
    return this.snapshot.members.find((m) => m.email.toLowerCase() === needle) ?? null;
  }

  async getMemberByName(name: string): Promise<Member | null> {
    return this.snapshot.members.find((m) => m.name === name) ?? null;
  }

  async getTeam(id: string): Promise<Team | null> {
    return this.snapshot.teams.find((t) => t.id === id) ?? null;
  }

  async getGroup(id: string): Promise<Group | null> {
    return this.snapshot.groups.find((g) => g.id === id) ?? null;
  }

  async getOrganization(id: string): Promise<Organization | null> {
    return this.snapshot.organizations.find((o) => o.id === id) ?? null;
  }

  async listOrganizations(limit: number): Promise<Organization[]> {
    return this.snapshot.organizations.slice(0, limit);
  }

  async listGroupsByOrganization(organizationId: string, limit: number): Promise<Group[]> {
    return this.snapshot.groups.filter((g) => g.organizationId === organizationId).slice(0, limit);
  }

  async listTeamsByGroup(groupId: string, limit: number): Promise<Team[]> {
    return this.snapshot.teams.filter((t) => t.groupId === groupId).slice(0, limit);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
