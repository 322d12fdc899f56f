import type { LedgerConfig } from "../config.js";
import type { IStorage } from "./types.js";
import { MemStorage } from "./memStorage.js";

export type * from "./types.js";
export { MemStorage } from "./memStorage.js";

export interface StorageHandle {
  storage: IStorage;
  close(): Promise<void>;
}

export async function createStorage(config: LedgerConfig): Promise<StorageHandle> {
  if (config.storageDriver === "memory") {
    console.warn("[Storage] Using in-memory storage; data is lost on restart");
    return { storage: new MemStorage(), close: async () => {} };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL must be set when STORAGE_DRIVER=postgres");
  }

  const { connectDatabase } = await import("../db.js");
  const { DatabaseStorage } = await import("./dbStorage.js");
  const { pool, db } = connectDatabase(config.databaseUrl);
  console.log("[Storage] Connected to Postgres");
  return {
    storage: new DatabaseStorage(db),
    close: async () => {
      await pool.end();
    },
  };
}
