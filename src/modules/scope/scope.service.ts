import type { IStorage } from "../../../server/storage/types.js";
import { insertCommunitySchema, type Community } from "../../../shared/schema.js";
import { ErrorKind, LedgerError, invalidInput } from "../../errors/ledgerError.js";
import type { AdminScopeOptions, ScopeOptions, ScopePrivilege } from "./scope.types.js";

const issueKey: unique symbol = Symbol("scope-token");

/**
 * Capability for one (person, community) pair. Only GuildScopeResolver can
 * mint one, and every community-owned mutation takes one instead of raw ids.
 */
export class ScopeToken {
  readonly personId: string;
  readonly communityId: string;
  protected readonly privilege: ScopePrivilege;

  constructor(key: typeof issueKey, personId: string, communityId: string, privilege: ScopePrivilege = "member") {
    if (key !== issueKey) {
      throw new Error("Scope tokens can only be issued by GuildScopeResolver");
    }
    this.personId = personId;
    this.communityId = communityId;
    this.privilege = privilege;
  }

  get isAdmin(): boolean {
    return this.privilege === "admin";
  }
}

/** Required by catalog, reset and role configuration writes. */
export class AdminScopeToken extends ScopeToken {
  private readonly adminGrant: true;

  constructor(key: typeof issueKey, personId: string, communityId: string) {
    super(key, personId, communityId, "admin");
    this.adminGrant = true;
  }
}

export interface GuildScopeResolverOptions {
  primaryCommunityId?: string;
}

export class GuildScopeResolver {
  constructor(
    private readonly storage: IStorage,
    private readonly options: GuildScopeResolverOptions = {},
  ) {}

  /** Falls back to the legacy primary community when the caller names none. */
  resolveCommunityId(communityId?: string | null): string {
    const resolved = communityId ?? this.options.primaryCommunityId;
    if (!resolved) {
      throw new LedgerError(ErrorKind.UnknownCommunity, "No community given and no primary community configured");
    }
    return resolved;
  }

  async registerCommunity(communityId: string, name: string): Promise<Community> {
    const parsed = insertCommunitySchema.safeParse({ id: communityId, name });
    if (!parsed.success) {
      throw invalidInput(parsed.error);
    }
    const community = await this.storage.createCommunity(parsed.data);
    console.log(`[ScopeResolver] Registered community ${community.id} (${community.name})`);
    return community;
  }

  /** Deletes the community and everything it owns: selections, progress, roles, members. */
  async removeCommunity(communityId: string): Promise<void> {
    const removed = await this.storage.deleteCommunity(communityId);
    if (!removed) {
      throw new LedgerError(ErrorKind.NotFound, `Community ${communityId} is not registered`);
    }
    console.log(`[ScopeResolver] Removed community ${communityId} and all of its records`);
  }

  async scope(personId: string, communityId: string, opts: ScopeOptions = {}): Promise<ScopeToken> {
    await this.admit(personId, communityId, opts);
    return new ScopeToken(issueKey, personId, communityId);
  }

  async adminScope(personId: string, communityId: string, opts: AdminScopeOptions): Promise<AdminScopeToken> {
    if (!opts.isAdministrator) {
      throw new LedgerError(ErrorKind.NotPermitted, "Only community administrators can change community configuration", {
        communityId,
      });
    }
    await this.admit(personId, communityId, opts);
    return new AdminScopeToken(issueKey, personId, communityId);
  }

  private async admit(personId: string, communityId: string, opts: ScopeOptions): Promise<void> {
    let community = await this.storage.getCommunity(communityId);
    if (!community) {
      if (!opts.autoRegister) {
        throw new LedgerError(ErrorKind.UnknownCommunity, `Community ${communityId} is not configured`, { communityId });
      }
      community = await this.registerCommunity(communityId, opts.communityName ?? `Guild ${communityId}`);
    }

    const person = await this.storage.getPerson(personId);
    if (!person) {
      throw new LedgerError(ErrorKind.NotFound, `Person ${personId} is not registered`);
    }

    await this.storage.addMember(community.id, person.id);
  }
}
