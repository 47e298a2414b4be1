import { readFile } from "node:fs/promises";
import { Injectable } from "@nestjs/common";
import { ConfigService } from "../config/config.service.js";
import type { CredentialSource } from "./credentials.types.js";

export const CREDENTIALS_ENV_VAR = "TENANT_CREDENTIALS";

/**
 * Reads the credentials blob from CREDENTIALS_FILE when configured,
 * otherwise from the TENANT_CREDENTIALS environment variable at read time.
 */
@Injectable()
export class EnvCredentialSource implements CredentialSource {
  constructor(private readonly configService: ConfigService) {}

  async read(): Promise<string | undefined> {
    const filePath = this.configService.get("credentialsFile");
    if (filePath) {
      return readFile(filePath, "utf-8");
    }
    return process.env[CREDENTIALS_ENV_VAR] || undefined;
  }
}
