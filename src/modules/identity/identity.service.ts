import type { IStorage } from "../../../server/storage/types.js";
import type { Person } from "../../../shared/schema.js";
import { ErrorKind, LedgerError } from "../../errors/ledgerError.js";
import type { ProfileClient } from "../../services/anilistClient.js";
import type { LinkedProfile } from "./identity.types.js";

export class IdentityService {
  constructor(
    private readonly storage: IStorage,
    private readonly profiles: Pick<ProfileClient, "fetchProfile">,
  ) {}

  async registerPerson(discordId: string): Promise<Person> {
    const trimmed = discordId.trim();
    if (!/^\d{1,32}$/.test(trimmed)) {
      throw new LedgerError(ErrorKind.InvalidInput, "discordId must be a Discord user snowflake");
    }
    const existing = await this.storage.getPersonByDiscordId(trimmed);
    if (existing) return existing;

    const person = await this.storage.createPerson(trimmed);
    console.log(`[Identity] Registered person ${person.id} for Discord user ${trimmed}`);
    return person;
  }

  async findByDiscordId(discordId: string): Promise<Person> {
    const person = await this.storage.getPersonByDiscordId(discordId);
    if (!person) {
      throw new LedgerError(ErrorKind.NotFound, `Discord user ${discordId} is not registered`);
    }
    return person;
  }

  /**
   * Binds the person to a catalog handle after confirming it exists.
   * Relinking replaces the handle; recorded progress is kept as it is.
   */
  async linkProfile(personId: string, handle: string): Promise<LinkedProfile> {
    const person = await this.requirePerson(personId);
    const wanted = handle.trim();
    if (!wanted) {
      throw new LedgerError(ErrorKind.InvalidInput, "A username is required");
    }

    const profile = await this.profiles.fetchProfile(wanted);
    if (!profile) {
      throw new LedgerError(ErrorKind.HandleNotFound, `AniList user ${wanted} was not found`, { handle: wanted });
    }

    const holder = await this.storage.getPersonByAnilistUsername(profile.name);
    if (holder && holder.id !== person.id) {
      throw new LedgerError(ErrorKind.AlreadyLinked, `AniList user ${profile.name} is already linked to another account`, {
        handle: profile.name,
      });
    }

    const previous = person.anilistUsername;
    if (holder && previous === profile.name && person.anilistId === profile.id) {
      return toLinkedProfile(person);
    }

    const updated = await this.storage.setPersonProfile(person.id, { username: profile.name, anilistId: profile.id });
    if (!updated) {
      throw new LedgerError(ErrorKind.NotFound, `Person ${personId} is not registered`);
    }
    if (previous && previous.toLowerCase() !== profile.name.toLowerCase()) {
      await this.storage.deleteCatalogSnapshot(person.id);
      console.log(`[Identity] Person ${person.id} relinked from ${previous} to ${profile.name}`);
    } else {
      console.log(`[Identity] Person ${person.id} linked to ${profile.name}`);
    }
    return toLinkedProfile(updated);
  }

  async getProfile(personId: string): Promise<LinkedProfile | null> {
    const person = await this.requirePerson(personId);
    return person.anilistUsername ? toLinkedProfile(person) : null;
  }

  async unlinkProfile(personId: string): Promise<void> {
    const person = await this.requirePerson(personId);
    if (!person.anilistUsername) return;
    await this.storage.setPersonProfile(person.id, null);
    await this.storage.deleteCatalogSnapshot(person.id);
    console.log(`[Identity] Person ${person.id} unlinked from ${person.anilistUsername}`);
  }

  private async requirePerson(personId: string): Promise<Person> {
    const person = await this.storage.getPerson(personId);
    if (!person) {
      throw new LedgerError(ErrorKind.NotFound, `Person ${personId} is not registered`);
    }
    return person;
  }
}

function toLinkedProfile(person: Person): LinkedProfile {
  if (!person.anilistUsername || person.anilistId === null || !person.linkedAt) {
    throw new LedgerError(ErrorKind.NotLinked, `Person ${person.id} has no linked profile`);
  }
  return {
    personId: person.id,
    discordId: person.discordId,
    anilistUsername: person.anilistUsername,
    anilistId: person.anilistId,
    linkedAt: person.linkedAt,
  };
}
