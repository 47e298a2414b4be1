import { Injectable, Logger } from "@nestjs/common";
import type { z } from "zod";
import type { CallerIdentity } from "../auth/identity.types.js";
import {
  ConfigMissingError,
  DeploymentAccessDeniedError,
  DeploymentNotFoundError,
  TenantNotFoundError,
  UpstreamRequestFailedError,
} from "../errors/index.js";
import { TenantResolverService } from "../tenant/tenant-resolver.service.js";
import type { TenantScope } from "../tenant/tenant.types.js";
import { TenantApiClient } from "../token/tenant-api.client.js";
import { decodeJson } from "../upstream/decode.js";
import type { UpstreamResponse } from "../upstream/upstream.types.js";
import {
  ConfigurationListSchema,
  DeploymentListSchema,
  DeploymentSchema,
  OperationResultSchema,
} from "./deployments.schema.js";
import type {
  ConfigurationList,
  ConfigurationRequest,
  CreateDeploymentRequest,
  Deployment,
  DeploymentListing,
  LocatedDeployment,
  ModifyDeploymentRequest,
  OperationResult,
  TenantDeployments,
} from "./deployments.types.js";

const DEPLOYMENTS_PATH = "/v2/lm/deployments";
const CONFIGURATIONS_PATH = "/v2/lm/configurations";

type TenantListing =
  | (TenantDeployments & { ok: true; count: number })
  | { ok: false; team: string; error: Error };

@Injectable()
export class DeploymentsService {
  private readonly logger = new Logger(DeploymentsService.name);

  constructor(
    private readonly api: TenantApiClient,
    private readonly tenantResolver: TenantResolverService,
  ) {}

  /**
   * Deployments of every tenant in scope, fetched in parallel.
   * A tenant that cannot be listed is logged and left out; the others are unaffected.
   */
  async listDeployments(scope: TenantScope): Promise<DeploymentListing> {
    const listings = await this.listEachTenant(scope);

    const result: DeploymentListing = { count: 0, deployments: [] };
    for (const listing of listings) {
      if (!listing.ok) continue;
      result.count += listing.count;
      result.deployments.push({ team: listing.team, deployments: listing.deployments });
    }
    return result;
  }

  /**
   * Owning tenant of a deployment. When no tenant lists it and one of them
   * could not be listed, that tenant's failure is raised instead of DeploymentNotFound.
   * Tenants without credentials are not failures.
   */
  async findDeployment(scope: TenantScope, deploymentId: string): Promise<LocatedDeployment> {
    const listings = await this.listEachTenant(scope);

    let failure: Error | undefined;
    for (const listing of listings) {
      if (!listing.ok) {
        if (!failure && !(listing.error instanceof TenantNotFoundError)) {
          failure = listing.error;
        }
        continue;
      }
      const deployment = listing.deployments.find((d) => d.id === deploymentId);
      if (deployment) {
        return { tenantId: listing.team, deployment };
      }
    }
    throw failure ?? new DeploymentNotFoundError(deploymentId);
  }

  /**
   * Tenant owning a deployment the caller wants to act on.
   * With a hint the tenant is only checked against the caller's scope.
   */
  async ownerOf(identity: CallerIdentity, deploymentId: string, hint?: string): Promise<string> {
    if (hint) {
      return this.tenantResolver.resolveTarget(identity, hint);
    }
    const scope = await this.tenantResolver.resolve(identity);
    const { tenantId } = await this.findDeployment(scope, deploymentId);
    return tenantId;
  }

  async getDeploymentDetails(tenantId: string, deploymentId: string): Promise<Deployment> {
    const response = await this.api.request(tenantId, {
      method: "GET",
      target: deploymentPath(deploymentId),
    });
    return this.expect(response, 200, DeploymentSchema, "deployment details", {
      tenantId,
      deploymentId,
    });
  }

  async createDeployment(tenantId: string, req: CreateDeploymentRequest): Promise<OperationResult> {
    let configurationId = req.configurationId;
    if (req.configurationRequest) {
      const created = await this.createConfiguration(tenantId, req.configurationRequest);
      configurationId = created.id;
      this.logger.log(`Created configuration ${created.id} for tenant ${tenantId}`);
    }

    const response = await this.api.request(tenantId, {
      method: "POST",
      target: DEPLOYMENTS_PATH,
      body: { configurationId, ttl: req.ttl },
    });
    const result = this.expect(response, 202, OperationResultSchema, "deployment creation");
    this.logger.log(`Created deployment ${result.id} for tenant ${tenantId}`);
    return result;
  }

  async updateDeployment(
    tenantId: string,
    deploymentId: string,
    req: ModifyDeploymentRequest,
  ): Promise<OperationResult> {
    const response = await this.api.request(tenantId, {
      method: "PATCH",
      target: deploymentPath(deploymentId),
      body: req,
    });
    return this.expect(response, 202, OperationResultSchema, "deployment modification", {
      tenantId,
      deploymentId,
    });
  }

  async deleteDeployment(tenantId: string, deploymentId: string): Promise<OperationResult> {
    const response = await this.api.request(tenantId, {
      method: "DELETE",
      target: deploymentPath(deploymentId),
    });
    const result = this.expect(response, 202, OperationResultSchema, "deployment deletion", {
      tenantId,
      deploymentId,
    });
    this.logger.log(`Deleted deployment ${deploymentId} of tenant ${tenantId}`);
    return result;
  }

  async listConfigurations(tenantId: string): Promise<ConfigurationList> {
    const response = await this.api.request(tenantId, { method: "GET", target: CONFIGURATIONS_PATH });
    return this.expect(response, 200, ConfigurationListSchema, "configuration list");
  }

  async createConfiguration(tenantId: string, req: ConfigurationRequest): Promise<OperationResult> {
    const response = await this.api.request(tenantId, {
      method: "POST",
      target: CONFIGURATIONS_PATH,
      body: req,
    });
    return this.expect(response, 201, OperationResultSchema, "configuration creation");
  }

  /**
   * One listing per tenant, in scope order. A failing tenant yields its error
   * and leaves the others untouched; unusable credentials fail the whole call.
   */
  private listEachTenant(scope: TenantScope): Promise<TenantListing[]> {
    return Promise.all(scope.map((tenantId) => this.listTenantDeployments(tenantId)));
  }

  private async listTenantDeployments(tenantId: string): Promise<TenantListing> {
    try {
      const response = await this.api.request(tenantId, { method: "GET", target: DEPLOYMENTS_PATH });
      const list = this.expect(response, 200, DeploymentListSchema, "deployment list");
      return {
        ok: true,
        team: tenantId,
        deployments: list.resources,
        count: list.count ?? list.resources.length,
      };
    } catch (error) {
      if (error instanceof ConfigMissingError) {
        throw error;
      }
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Skipping deployments of tenant ${tenantId}: ${failure.message}`);
      return { ok: false, team: tenantId, error: failure };
    }
  }

  private expect<S extends z.ZodTypeAny>(
    response: UpstreamResponse,
    expectedStatus: number,
    schema: S,
    what: string,
    target?: { tenantId: string; deploymentId: string },
  ): z.output<S> {
    if (response.status !== expectedStatus) {
      if (target && response.status === 404) {
        throw new DeploymentNotFoundError(target.deploymentId);
      }
      if (target && response.status === 403) {
        throw new DeploymentAccessDeniedError(target.deploymentId, target.tenantId);
      }
      throw new UpstreamRequestFailedError(response.status, response.body);
    }
    return decodeJson(response.body, schema, what);
  }
}

function deploymentPath(deploymentId: string): string {
  return `${DEPLOYMENTS_PATH}/${encodeURIComponent(deploymentId)}`;
}
