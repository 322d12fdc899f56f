import type { LedgerConfig } from "./config.js";
import type { IStorage } from "./storage/types.js";
import { ChallengeCatalogService } from "../src/modules/challenges/challenges.service.js";
import { IdentityService } from "../src/modules/identity/identity.service.js";
import { LeaderboardService } from "../src/modules/leaderboards/leaderboard.service.js";
import { CompletionDispatcher } from "../src/modules/progress/progress.dispatcher.js";
import { ProgressLedgerService } from "../src/modules/progress/progress.service.js";
import { RecommendationService } from "../src/modules/recommendations/recommendations.service.js";
import { RoleConfigService } from "../src/modules/roles/roles.service.js";
import { GuildScopeResolver } from "../src/modules/scope/scope.service.js";
import { SyncService } from "../src/modules/sync/sync.service.js";
import { AnilistClient, type ProfileClient } from "../src/services/anilistClient.js";
import { createRoleGranter, type RoleGranter } from "../src/services/discordRoleGranter.js";

export interface LedgerServices {
  resolver: GuildScopeResolver;
  identity: IdentityService;
  catalog: ChallengeCatalogService;
  ledger: ProgressLedgerService;
  leaderboards: LeaderboardService;
  roles: RoleConfigService;
  sync: SyncService;
  recommendations: RecommendationService;
  dispatcher: CompletionDispatcher;
}

export interface ServiceOverrides {
  profiles?: ProfileClient;
  granter?: RoleGranter;
  clock?: () => Date;
}

export function createServices(storage: IStorage, config: LedgerConfig, overrides: ServiceOverrides = {}): LedgerServices {
  const clock = overrides.clock ?? (() => new Date());
  const profiles = overrides.profiles ?? new AnilistClient({ apiUrl: config.anilistApiUrl });
  const granter = overrides.granter ?? createRoleGranter(config.discordToken);

  const roles = new RoleConfigService(storage);
  const ledger = new ProgressLedgerService(storage, clock);
  const dispatcher = new CompletionDispatcher(storage, roles, granter, { clock });

  return {
    resolver: new GuildScopeResolver(storage, { primaryCommunityId: config.primaryCommunityId }),
    identity: new IdentityService(storage, profiles),
    catalog: new ChallengeCatalogService(storage),
    ledger,
    leaderboards: new LeaderboardService(storage),
    roles,
    sync: new SyncService(storage, profiles, ledger, dispatcher, { cacheHours: config.snapshotCacheHours, clock }),
    recommendations: new RecommendationService(storage),
    dispatcher,
  };
}
