import { ClientError, GraphQLClient, gql } from "graphql-request";
import { z } from "zod";
import { catalogSnapshotSchema, type CatalogSnapshot } from "../../shared/catalog.js";
import { ErrorKind, LedgerError } from "../errors/ledgerError.js";

export const DEFAULT_ANILIST_API_URL = "https://graphql.anilist.co";

const PROFILE_QUERY = gql`
  query ($name: String) {
    User(name: $name) {
      id
      name
    }
  }
`;

const STATISTICS_QUERY = gql`
  fragment ListStatistics on UserStatistics {
    count
    meanScore
    statuses { status count }
    scores { score count }
    genres { genre count }
    formats { format count }
    countries { country count }
  }

  query ($name: String) {
    User(name: $name) {
      id
      name
      statistics {
        anime { ...ListStatistics }
        manga { ...ListStatistics }
      }
    }
  }
`;

const profileSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
});

const profileResponseSchema = z.object({ User: profileSchema.nullable() });

const statisticsResponseSchema = z.object({
  User: profileSchema.extend({ statistics: catalogSnapshotSchema }).nullable(),
});

export interface ExternalProfile {
  id: number;
  /** Canonical spelling of the handle as the catalog stores it. */
  name: string;
}

export interface ProfileClient {
  fetchProfile(handle: string): Promise<ExternalProfile | null>;
  fetchCatalogSnapshot(handle: string): Promise<CatalogSnapshot>;
}

export interface AnilistClientOptions {
  apiUrl?: string;
  client?: Pick<GraphQLClient, "request">;
}

export class AnilistClient implements ProfileClient {
  private readonly client: Pick<GraphQLClient, "request">;

  constructor(options: AnilistClientOptions = {}) {
    this.client = options.client ?? new GraphQLClient(options.apiUrl ?? DEFAULT_ANILIST_API_URL);
  }

  async fetchProfile(handle: string): Promise<ExternalProfile | null> {
    const data = await this.query(PROFILE_QUERY, handle);
    if (data === null) return null;
    return profileResponseSchema.parse(data).User;
  }

  async fetchCatalogSnapshot(handle: string): Promise<CatalogSnapshot> {
    const data = await this.query(STATISTICS_QUERY, handle);
    const user = data === null ? null : statisticsResponseSchema.parse(data).User;
    if (!user) {
      throw new LedgerError(ErrorKind.HandleNotFound, `AniList user ${handle} was not found`, { handle });
    }
    return user.statistics;
  }

  /** Resolves to null when AniList answers 404 (unknown user). */
  private async query(document: string, name: string): Promise<unknown> {
    try {
      return await this.client.request<unknown>(document, { name });
    } catch (error) {
      if (error instanceof ClientError && error.response.status === 404) {
        return null;
      }
      const status = error instanceof ClientError ? `HTTP ${error.response.status}` : "a network error";
      console.error(`[AniList] Query for ${name} failed with ${status}:`, error);
      throw error;
    }
  }
}
