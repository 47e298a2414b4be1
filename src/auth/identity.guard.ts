import { type CanActivate, type ExecutionContext, Inject, Injectable } from "@nestjs/common";
import type { Request } from "express";
import { DIRECTORY_REPOSITORY, type DirectoryRepository } from "../data/directory.types.js";
import { MemberNotFoundError, UnauthenticatedError } from "../errors/index.js";
import type { CallerIdentity } from "./identity.types.js";
import { parseForwardedIdentity, toCallerIdentity } from "./identity.utils.js";

/** The part of a guarded request that handlers read */
export interface AuthenticatedRequest {
  identity: CallerIdentity;
}

@Injectable()
export class IdentityGuard implements CanActivate {
  constructor(@Inject(DIRECTORY_REPOSITORY) private readonly directory: DirectoryRepository) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    const forwarded = parseForwardedIdentity(request.headers);
    if (!forwarded) {
      throw new UnauthenticatedError();
    }

    const member = forwarded.email
      ? await this.directory.getMemberByEmail(forwarded.email)
      : await this.directory.getMemberByName(forwarded.username ?? "");
    if (!member) {
      throw new MemberNotFoundError(forwarded.email ?? forwarded.username ?? "");
    }

    Object.assign(request, { identity: toCallerIdentity(member) });
    return true;
  }
}
