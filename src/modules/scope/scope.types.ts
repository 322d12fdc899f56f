export interface ScopeOptions {
  /** Register the community on first contact instead of failing with UnknownCommunity. */
  autoRegister?: boolean;
  /** Display name used when the community gets registered. */
  communityName?: string;
}

export interface AdminScopeOptions extends ScopeOptions {
  /**
   * Attested by the command layer from the platform's permission model
   * (e.g. Manage Server on Discord).
   */
  isAdministrator: boolean;
}

export type ScopePrivilege = "member" | "admin";
