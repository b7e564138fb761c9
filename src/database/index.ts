import { config } from "@/config/env";
import type { RecordStore } from "@/types/store";
import { MemoryRecordStore } from "./memoryRecordStore";
import { PgRecordStore } from "./pgRecordStore";
import { closeDatabase, db } from "./connection";

const createRecordStore = (): RecordStore =>
  config.store.driver === "memory"
    ? new MemoryRecordStore()
    : new PgRecordStore(db);

export const recordStore = createRecordStore();

export const closeRecordStore = async (): Promise<void> => {
  if (config.store.driver === "postgres") {
    await closeDatabase();
  }
};
