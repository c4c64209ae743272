import type { Container } from "../models/tables";
import { StorageError } from "../utils/errors";
import { describeObject, type ObjectStore } from "./objectStore";

export class MemoryObjectStore implements ObjectStore {
  readonly name = "memory";
  private readonly objects = new Map<string, Buffer>();
  private readonly writes: string[] = [];

  async get(container: Container, objectPath: string) {
    const key = describeObject(container, objectPath);
    const data = this.objects.get(key);
    if (!data) {
      throw new StorageError(`Object ${key} does not exist`);
    }
    return Buffer.from(data);
  }

  async put(container: Container, objectPath: string, data: Buffer) {
    const key = describeObject(container, objectPath);
    this.objects.set(key, Buffer.from(data));
    this.writes.push(key);
  }

  has(container: Container, objectPath: string) {
    return this.objects.has(describeObject(container, objectPath));
  }

  /** Object keys in the order they were written. */
  getWriteLog() {
    return [...this.writes];
  }
}
