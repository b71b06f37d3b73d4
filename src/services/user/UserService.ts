import { AccountRecord, AccountStore } from "../../repositories/types";
import { PasswordHasher } from "../../utils/password";
import { TypedEventEmitter } from "../../utils/events";
import { AuthenticationError, ConflictError } from "../../utils/errors";
import { logAccountOperation } from "../../utils/logger";

export interface RegisterParams {
  username: string;
  password: string;
  email?: string | undefined;
  stripe_account_id?: string | undefined;
}

export interface PublicAccount {
  id: string;
  username: string;
  email: string | null;
  stripe_account_id: string | null;
  created_at: Date;
}

export function toPublicAccount(account: AccountRecord): PublicAccount {
  return {
    id: account.id,
    username: account.username,
    email: account.email,
    stripe_account_id: account.stripe_account_id,
    created_at: account.created_at,
  };
}

export class UserService {
  constructor(
    private readonly accounts: AccountStore,
    private readonly hasher: PasswordHasher,
    private readonly events: TypedEventEmitter
  ) {}

  /**
   * Create an account. Usernames are unique and case-sensitive.
   */
  async register(params: RegisterParams): Promise<PublicAccount> {
    const existing = await this.accounts.findByUsername(params.username);
    if (existing) {
      throw new ConflictError("Username already exists");
    }

    const account = await this.accounts.create({
      username: params.username,
      hashed_password: await this.hasher.hash(params.password),
      email: params.email ?? null,
      stripe_account_id: params.stripe_account_id ?? null,
    });

    logAccountOperation("registered", account.username);
    this.events.emit("account:registered", {
      accountId: account.id,
      username: account.username,
    });

    return toPublicAccount(account);
  }

  /**
   * Check a username/password pair. Unknown users and wrong passwords fail
   * identically.
   */
  async login(username: string, password: string): Promise<PublicAccount> {
    const account = await this.accounts.findByUsername(username);
    const valid = account
      ? await this.hasher.verify(password, account.hashed_password)
      : false;

    if (!account || !valid) {
      throw new AuthenticationError("Invalid username or password");
    }

    logAccountOperation("login", account.username);
    return toPublicAccount(account);
  }
}
