import { HttpException, HttpStatus } from "@nestjs/common";

export type GatewayErrorKind =
  | "ConfigMissing"
  | "TenantNotFound"
  | "NoTenantScope"
  | "UpstreamAuthFailed"
  | "UpstreamRequestFailed"
  | "DecodeFailed"
  | "DeploymentNotFound"
  | "DeploymentAccessDenied"
  | "Unauthenticated"
  | "MemberNotFound";

/**
 * Base class for every failure the gateway reports to callers.
 * `kind` lets callers tell "not found", "not authorized" and "upstream unhealthy" apart.
 */
export abstract class GatewayError extends HttpException {
  abstract readonly kind: GatewayErrorKind;
}

export class ConfigMissingError extends GatewayError {
  readonly kind = "ConfigMissing";

  constructor(detail: string) {
    super(`Tenant credentials unavailable: ${detail}`, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

export class TenantNotFoundError extends GatewayError {
  readonly kind = "TenantNotFound";

  constructor(
    readonly tenantId: string,
    reason = `No credentials found for tenant ${tenantId}`,
  ) {
    super(reason, HttpStatus.FORBIDDEN);
  }
}

export class NoTenantScopeError extends GatewayError {
  readonly kind = "NoTenantScope";

  constructor(username: string) {
    super(`User ${username} is not assigned to any tenant`, HttpStatus.FORBIDDEN);
  }
}

export class UpstreamAuthFailedError extends GatewayError {
  readonly kind = "UpstreamAuthFailed";

  constructor(
    readonly tenantId: string,
    readonly upstreamStatus: number | null,
    readonly upstreamBody: string,
    detail = upstreamBody,
  ) {
    super(
      upstreamStatus === null
        ? `Token request for tenant ${tenantId} failed: ${detail}`
        : `Token request for tenant ${tenantId} failed with status ${String(upstreamStatus)}: ${detail}`,
      HttpStatus.BAD_GATEWAY,
    );
  }
}

export class UpstreamRequestFailedError extends GatewayError {
  readonly kind = "UpstreamRequestFailed";

  constructor(
    readonly upstreamStatus: number | null,
    readonly upstreamBody: string,
  ) {
    super(
      upstreamStatus === null
        ? `Upstream request failed: ${upstreamBody}`
        : `Upstream request failed with status ${String(upstreamStatus)}: ${upstreamBody}`,
      HttpStatus.BAD_GATEWAY,
    );
  }
}

export class DecodeFailedError extends GatewayError {
  readonly kind = "DecodeFailed";

  constructor(what: string, detail: string) {
    super(`Failed to decode ${what}: ${detail}`, HttpStatus.BAD_GATEWAY);
  }
}

export class DeploymentNotFoundError extends GatewayError {
  readonly kind = "DeploymentNotFound";

  constructor(
    readonly deploymentId: string,
    reason = `Deployment ${deploymentId} not found or not accessible`,
  ) {
    super(reason, HttpStatus.NOT_FOUND);
  }
}

export class DeploymentAccessDeniedError extends GatewayError {
  readonly kind = "DeploymentAccessDenied";

  constructor(deploymentId: string, tenantId: string) {
    super(`Access to deployment ${deploymentId} denied for tenant ${tenantId}`, HttpStatus.FORBIDDEN);
  }
}

export class UnauthenticatedError extends GatewayError {
  readonly kind = "Unauthenticated";

  constructor() {
    super("Missing forwarded user identity", HttpStatus.UNAUTHORIZED);
  }
}

export class MemberNotFoundError extends GatewayError {
  readonly kind = "MemberNotFound";

  constructor(lookup: string) {
    super(`User ${lookup} not found in directory`, HttpStatus.FORBIDDEN);
  }
}
