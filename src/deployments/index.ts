export { DeploymentsModule } from "./deployments.module.js";
export { DeploymentsService } from "./deployments.service.js";
export type {
  Configuration,
  ConfigurationList,
  Deployment,
  DeploymentListing,
  LocatedDeployment,
  OperationResult,
  TenantDeployments,
} from "./deployments.types.js";
