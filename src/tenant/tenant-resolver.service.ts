import { Inject, Injectable, Logger } from "@nestjs/common";
import type { CallerIdentity } from "../auth/identity.types.js";
import { ConfigService } from "../config/config.service.js";
import { CredentialStoreService } from "../credentials/credential-store.service.js";
import {
  DIRECTORY_REPOSITORY,
  type DirectoryRepository,
  type Group,
  type Organization,
  type Team,
} from "../data/directory.types.js";
import { NoTenantScopeError, TenantNotFoundError } from "../errors/index.js";
import { ORGANIZATION_SCAN_LIMIT, type TenantScope } from "./tenant.types.js";
import { extractTagTenants, uniqueInOrder } from "./tenant.utils.js";

@Injectable()
export class TenantResolverService {
  private readonly logger = new Logger(TenantResolverService.name);

  constructor(
    @Inject(DIRECTORY_REPOSITORY) private readonly directory: DirectoryRepository,
    private readonly credentialStore: CredentialStoreService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Role-derived tenants followed by tag-derived ones, first occurrence wins.
   */
  async resolve(identity: CallerIdentity): Promise<TenantScope> {
    const roleTenants = await this.roleTenants(identity);
    const tagTenants = extractTagTenants(identity.freeFormTags);
    const scope = uniqueInOrder([...roleTenants, ...tagTenants]);
    if (scope.length === 0) {
      throw new NoTenantScopeError(identity.username);
    }
    this.logger.debug(`Resolved scope for ${identity.username}: ${scope.join(", ")}`);
    return scope;
  }

  /**
   * The resolved scope restricted to tenants that have credentials.
   */
  async usableTenants(identity: CallerIdentity): Promise<string[]> {
    const scope = await this.resolve(identity);
    const known = new Set(await this.credentialStore.tenantIds());
    return scope.filter((tenantId) => known.has(tenantId));
  }

  /**
   * Pick the single tenant a direct action runs against.
   * An explicit hint must be in scope; otherwise the caller's own team is preferred.
   */
  async resolveTarget(identity: CallerIdentity, hint?: string): Promise<string> {
    const scope = await this.resolve(identity);

    if (hint) {
      if (!scope.includes(hint)) {
        throw new TenantNotFoundError(hint, `Tenant ${hint} is not in scope for user ${identity.username}`);
      }
      await this.credentialStore.get(hint);
      return hint;
    }

    const ownTeam = await this.ownTeam(identity);
    const candidates = uniqueInOrder(ownTeam ? [ownTeam.name, ...scope] : scope);
    for (const candidate of candidates) {
      if (await this.credentialStore.has(candidate)) {
        return candidate;
      }
    }
    throw new TenantNotFoundError(
      candidates[0] ?? identity.username,
      `No tenant with credentials in scope for user ${identity.username}`,
    );
  }

  private async roleTenants(identity: CallerIdentity): Promise<string[]> {
    switch (identity.teamRole) {
      case "manager": {
        const group = await this.findManagedGroup(identity);
        return group ? this.teamNamesInGroup(group.id) : [];
      }
      case "mmm": {
        const organization = await this.findOwnedOrganization(identity);
        return organization ? this.teamNamesInOrganization(organization.id) : [];
      }
      default: {
        const team = await this.ownTeam(identity);
        return team ? [team.name] : [];
      }
    }
  }

  private async findManagedGroup(identity: CallerIdentity): Promise<Group | null> {
    const limit = this.configService.get("teamLimit");
    const ownGroup = await this.ownGroup(identity);

    if (ownGroup) {
      if (ownGroup.owner === identity.username) {
        return ownGroup;
      }
      const siblings = await this.directory.listGroupsByOrganization(ownGroup.organizationId, limit);
      const owned = siblings.find((g) => g.owner === identity.username);
      if (owned) {
        return owned;
      }
    }

    const organizations = await this.directory.listOrganizations(ORGANIZATION_SCAN_LIMIT);
    for (const organization of organizations) {
      const groups = await this.directory.listGroupsByOrganization(organization.id, limit);
      const owned = groups.find((g) => g.owner === identity.username);
      if (owned) {
        return owned;
      }
    }

    // No owned group anywhere: degrade to the manager's own group
    if (ownGroup) {
      this.logger.warn(`No group owned by manager ${identity.username}, using own team's group`);
    }
    return ownGroup;
  }

  private async findOwnedOrganization(identity: CallerIdentity): Promise<Organization | null> {
    const ownGroup = await this.ownGroup(identity);
    if (ownGroup) {
      const organization = await this.directory.getOrganization(ownGroup.organizationId);
      if (organization && organization.owner === identity.username) {
        return organization;
      }
    }

    const organizations = await this.directory.listOrganizations(ORGANIZATION_SCAN_LIMIT);
    return organizations.find((o) => o.owner === identity.username) ?? null;
  }

  private async teamNamesInGroup(groupId: string): Promise<string[]> {
    const teams = await this.directory.listTeamsByGroup(groupId, this.configService.get("teamLimit"));
    return teams.map((t) => t.name);
  }

  private async teamNamesInOrganization(organizationId: string): Promise<string[]> {
    const groups = await this.directory.listGroupsByOrganization(
      organizationId,
      this.configService.get("teamLimit"),
    );
    const names: string[] = [];
    for (const group of groups) {
      names.push(...(await this.teamNamesInGroup(group.id)));
    }
    return names;
  }

  private async ownTeam(identity: CallerIdentity): Promise<Team | null> {
    if (!identity.teamId) return null;
    return this.directory.getTeam(identity.teamId);
  }

  private async ownGroup(identity: CallerIdentity): Promise<Group | null> {
    const team = await this.ownTeam(identity);
    if (!team) return null;
    return this.directory.getGroup(team.groupId);
  }
}
