/**
 * Base Repository
 *
 * Shared plumbing for the Mongoose repositories: id validation, mapping
 * lean documents to plain records, and uniform failure logging.
 */

import { Model, Types } from "mongoose";
import { logDatabaseOperation } from "../../utils/logger";

const OBJECT_ID_PATTERN = /^[a-fA-F0-9]{24}$/;

export abstract class BaseRepository<TRaw extends { _id: Types.ObjectId }, TRecord> {
  protected readonly modelName: string;

  constructor(protected readonly model: Model<TRaw>) {
    this.modelName = model.modelName;
  }

  /**
   * Map a lean document to the record handed to services
   */
  protected abstract toRecord(doc: TRaw): TRecord;

  /**
   * Ids that can never match a document. Callers treat them as "not found"
   * instead of letting Mongoose raise a CastError.
   */
  protected isValidId(id: string): boolean {
    return OBJECT_ID_PATTERN.test(id);
  }

  protected toObjectId(id: string): Types.ObjectId {
    return new Types.ObjectId(id);
  }

  /**
   * Run a query, logging the operation and rethrowing failures unchanged
   */
  protected async run<T>(
    operation: string,
    query: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      const result = await fn();
      logDatabaseOperation(operation, this.modelName, query);
      return result;
    } catch (error) {
      logDatabaseOperation(operation, this.modelName, query, error);
      throw error;
    }
  }
}
