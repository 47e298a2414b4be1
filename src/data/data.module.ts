import { Module } from "@nestjs/common";
import { DIRECTORY_REPOSITORY } from "./directory.types.js";
import { FileDirectoryRepository } from "./file-directory.repository.js";

@Module({
  providers: [
    FileDirectoryRepository,
    { provide: DIRECTORY_REPOSITORY, useExisting: FileDirectoryRepository },
  ],
  exports: [DIRECTORY_REPOSITORY],
})
export class DataModule {}
