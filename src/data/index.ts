export { DataModule } from "./data.module.js";
export {
  DIRECTORY_REPOSITORY,
  type DirectoryRepository,
  type DirectorySnapshot,
  type Group,
  type Member,
  type Organization,
  type Team,
  type TeamRole,
} from "./directory.types.js";
export { FileDirectoryRepository } from "./file-directory.repository.js";
