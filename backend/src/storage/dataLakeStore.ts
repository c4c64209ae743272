import { DefaultAzureCredential } from "@azure/identity";
import { DataLakeServiceClient } from "@azure/storage-file-datalake";
import type { AppConfig } from "../config";
import type { Container } from "../models/tables";
import { StorageError, safeErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { describeObject, type ObjectStore } from "./objectStore";

export class DataLakeObjectStore implements ObjectStore {
  readonly name = "azure-datalake";
  private readonly service: DataLakeServiceClient;

  constructor(accountUrl: string) {
    this.service = new DataLakeServiceClient(accountUrl, new DefaultAzureCredential());
  }

  private fileClient(container: Container, objectPath: string) {
    return this.service.getFileSystemClient(container).getFileClient(objectPath);
  }

  async get(container: Container, objectPath: string) {
    const key = describeObject(container, objectPath);
    try {
      const data = await this.fileClient(container, objectPath).readToBuffer();
      logger.debug("Downloaded object", { key, bytes: data.byteLength });
      return data;
    } catch (error) {
      throw new StorageError(`Failed to read ${key}: ${safeErrorMessage(error)}`, { cause: error });
    }
  }

  async put(container: Container, objectPath: string, data: Buffer) {
    const key = describeObject(container, objectPath);
    try {
      await this.fileClient(container, objectPath).upload(data);
      logger.debug("Uploaded object", { key, bytes: data.byteLength });
    } catch (error) {
      throw new StorageError(`Failed to write ${key}: ${safeErrorMessage(error)}`, { cause: error });
    }
  }
}

export const createObjectStore = (config: AppConfig): ObjectStore => new DataLakeObjectStore(config.storageAccountUrl);
