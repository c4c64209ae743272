import type { Container } from "../models/tables";

/**
 * Whole-object storage. `put` replaces any existing object at the same path;
 * there is no append or partial write.
 */
export interface ObjectStore {
  readonly name: string;
  get: (container: Container, objectPath: string) => Promise<Buffer>;
  put: (container: Container, objectPath: string, data: Buffer) => Promise<void>;
}

export const describeObject = (container: Container, objectPath: string) => `${container}/${objectPath}`;
