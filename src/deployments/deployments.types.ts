import type { z } from "zod";
import type {
  ConfigurationListSchema,
  ConfigurationRequestSchema,
  ConfigurationSchema,
  CreateDeploymentRequestSchema,
  DeploymentSchema,
  ModifyDeploymentRequestSchema,
  OperationResultSchema,
} from "./deployments.schema.js";

export type Deployment = z.infer<typeof DeploymentSchema>;
export type Configuration = z.infer<typeof ConfigurationSchema>;
export type ConfigurationList = z.infer<typeof ConfigurationListSchema>;
export type OperationResult = z.infer<typeof OperationResultSchema>;

export type ConfigurationRequest = z.infer<typeof ConfigurationRequestSchema>;
export type CreateDeploymentRequest = z.infer<typeof CreateDeploymentRequestSchema>;
export type ModifyDeploymentRequest = z.infer<typeof ModifyDeploymentRequestSchema>;

export interface TenantDeployments {
  team: string;
  deployments: Deployment[];
}

export interface DeploymentListing {
  count: number;
  deployments: TenantDeployments[];
}

export interface LocatedDeployment {
  tenantId: string;
  deployment: Deployment;
}
