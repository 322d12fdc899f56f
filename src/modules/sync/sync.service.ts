import type { IStorage } from "../../../server/storage/types.js";
import type { CatalogSnapshot } from "../../../shared/catalog.js";
import { ErrorKind, LedgerError } from "../../errors/ledgerError.js";
import type { ProfileClient } from "../../services/anilistClient.js";
import type { CompletionDispatcher } from "../progress/progress.dispatcher.js";
import type { ProgressLedgerService } from "../progress/progress.service.js";
import type { UpdatedRecord } from "../progress/progress.types.js";
import type { ScopeToken } from "../scope/scope.service.js";

export const DEFAULT_SNAPSHOT_CACHE_HOURS = 12;

export interface SyncOptions {
  /** Fetch a new snapshot even when the stored one is still fresh. */
  force?: boolean;
}

export interface SyncResult {
  anilistUsername: string;
  cached: boolean;
  fetchedAt: Date;
  records: UpdatedRecord[];
}

export interface SyncServiceOptions {
  cacheHours?: number;
  clock?: () => Date;
}

export class SyncService {
  private readonly cacheMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly storage: IStorage,
    private readonly profiles: Pick<ProfileClient, "fetchCatalogSnapshot">,
    private readonly ledger: ProgressLedgerService,
    private readonly dispatcher: Pick<CompletionDispatcher, "drain"> | null,
    options: SyncServiceOptions = {},
  ) {
    this.cacheMs = (options.cacheHours ?? DEFAULT_SNAPSHOT_CACHE_HOURS) * 60 * 60 * 1000;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Brings the token holder's progress in the token's community up to date
   * with their AniList statistics.
   */
  async syncPerson(token: ScopeToken, opts: SyncOptions = {}): Promise<SyncResult> {
    const person = await this.storage.getPerson(token.personId);
    if (!person) {
      throw new LedgerError(ErrorKind.NotFound, `Person ${token.personId} is not registered`);
    }
    if (!person.anilistUsername) {
      throw new LedgerError(ErrorKind.NotLinked, "Link an AniList profile before syncing progress");
    }

    const { snapshot, cached, fetchedAt } = await this.loadSnapshot(person.id, person.anilistUsername, opts.force ?? false);
    const records = await this.ledger.recordSnapshot(token, snapshot);

    if (this.dispatcher && records.some((r) => r.completedNow)) {
      await this.dispatcher.drain();
    }

    console.log(
      `[Sync] ${person.anilistUsername} in community ${token.communityId}: ${records.length} challenges evaluated (${cached ? "cached" : "fresh"} snapshot)`,
    );
    return { anilistUsername: person.anilistUsername, cached, fetchedAt, records };
  }

  private async loadSnapshot(
    personId: string,
    username: string,
    force: boolean,
  ): Promise<{ snapshot: CatalogSnapshot; cached: boolean; fetchedAt: Date }> {
    const now = this.clock();
    const stored = await this.storage.getCatalogSnapshot(personId);
    if (
      !force &&
      stored &&
      stored.anilistUsername.toLowerCase() === username.toLowerCase() &&
      now.getTime() - stored.fetchedAt.getTime() < this.cacheMs
    ) {
      return { snapshot: stored.payload, cached: true, fetchedAt: stored.fetchedAt };
    }

    const snapshot = await this.profiles.fetchCatalogSnapshot(username);
    await this.storage.saveCatalogSnapshot(personId, username, snapshot, now);
    return { snapshot, cached: false, fetchedAt: now };
  }
}
