export { CredentialStoreService } from "./credential-store.service.js";
export { CredentialsModule } from "./credentials.module.js";
export {
  CREDENTIAL_SOURCE,
  type CredentialSource,
  type TenantCredential,
} from "./credentials.types.js";
export { CREDENTIALS_ENV_VAR, EnvCredentialSource } from "./env-credential.source.js";
