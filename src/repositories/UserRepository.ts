/**
 * User Repository
 *
 * Data access layer for accounts.
 */

import { BaseRepository } from "./base/BaseRepository";
import { User, IUser } from "../models/User";
import { AccountRecord, AccountStore, NewAccount } from "./types";

export class UserRepository
  extends BaseRepository<IUser, AccountRecord>
  implements AccountStore
{
  constructor() {
    super(User);
  }

  protected toRecord(doc: IUser): AccountRecord {
    return {
      id: doc._id.toString(),
      username: doc.username,
      hashed_password: doc.hashed_password,
      email: doc.email ?? null,
      stripe_account_id: doc.stripe_account_id ?? null,
      credential_version: doc.credential_version ?? 0,
      created_at: doc.createdAt,
    };
  }

  async findById(id: string): Promise<AccountRecord | null> {
    if (!this.isValidId(id)) return null;
    const doc = await this.run("findById", { id }, () =>
      this.model.findById(this.toObjectId(id)).lean<IUser>().exec()
    );
    return doc ? this.toRecord(doc) : null;
  }

  /**
   * Exact, case-sensitive match
   */
  async findByUsername(username: string): Promise<AccountRecord | null> {
    const doc = await this.run("findByUsername", { username }, () =>
      this.model.findOne({ username }).lean<IUser>().exec()
    );
    return doc ? this.toRecord(doc) : null;
  }

  async findByIds(ids: string[]): Promise<AccountRecord[]> {
    const validIds = ids.filter((id) => this.isValidId(id));
    if (validIds.length === 0) return [];

    const docs = await this.run("findByIds", { count: validIds.length }, () =>
      this.model
        .find({ _id: { $in: validIds.map((id) => this.toObjectId(id)) } })
        .lean<IUser[]>()
        .exec()
    );
    return docs.map((doc) => this.toRecord(doc));
  }

  async create(input: NewAccount): Promise<AccountRecord> {
    const doc = await this.run("create", { username: input.username }, () =>
      this.model.create({
        username: input.username,
        hashed_password: input.hashed_password,
        email: input.email,
        stripe_account_id: input.stripe_account_id,
        credential_version: 0,
      })
    );
    return this.toRecord(doc);
  }

  async updateCredential(
    id: string,
    expectedVersion: number,
    hashedPassword: string
  ): Promise<AccountRecord | null> {
    if (!this.isValidId(id)) return null;

    const doc = await this.run("updateCredential", { id, expectedVersion }, () =>
      this.model
        .findOneAndUpdate(
          { _id: this.toObjectId(id), credential_version: expectedVersion },
          {
            $set: { hashed_password: hashedPassword },
            $inc: { credential_version: 1 },
          },
          { new: true }
        )
        .lean<IUser>()
        .exec()
    );
    return doc ? this.toRecord(doc) : null;
  }
}

export const userRepository = new UserRepository();
