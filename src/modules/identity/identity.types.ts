export interface LinkedProfile {
  personId: string;
  discordId: string;
  anilistUsername: string;
  anilistId: number;
  linkedAt: Date;
}

export interface LinkProfileRequest {
  username: string;
}
