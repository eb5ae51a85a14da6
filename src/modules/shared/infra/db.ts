import { Kysely, PostgresDialect } from "kysely";
import { Pool } from "pg";
import { config } from "./config.js";
import type { DB as DBType } from "./db-schema.js";

export type DatabaseExecutor = Kysely<DBType>;

let db: DatabaseExecutor | undefined;

export function getDb(): DatabaseExecutor {
  if (!db) {
    db = new Kysely<DBType>({
      dialect: new PostgresDialect({
        pool: new Pool({
          connectionString: config.DATABASE_URL,
        }),
      }),
    });
  }
  return db;
}

export class DatabaseError extends Error {
  constructor({ message, cause }: { message: string; cause: unknown }) {
    super(message);
    this.name = "DatabaseError";
    this.cause = cause;
  }
}

export async function dbQuery<A>(run: () => Promise<A>, errorMessage: string) {
  try {
    return await run();
  } catch (error) {
    throw new DatabaseError({ message: errorMessage, cause: error });
  }
}
