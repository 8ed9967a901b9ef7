import { MalformedInputError } from "../errors.js";
import { openRecordFile, type RecordSource } from "./record-loader.js";

import type { EntityType, RecordDescriptor } from "../types/index.js";

/**
 * Source of raw records for each entity type
 */
export interface RecordReader {
  open(descriptor: RecordDescriptor): Promise<RecordSource>;
}

/**
 * Reads one extract file per entity type from disk
 */
export class FileRecordReader implements RecordReader {
  constructor(
    private readonly files: Readonly<Partial<Record<EntityType, string>>>
  ) {}

  async open(descriptor: RecordDescriptor): Promise<RecordSource> {
    const path = this.files[descriptor.entityType];
    if (path === undefined || path === "") {
      throw new MalformedInputError(
        `No extract file configured for ${descriptor.entityType}`
      );
    }
    return openRecordFile(descriptor, path);
  }
}
