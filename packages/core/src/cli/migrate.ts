import { closePool, getPool } from "../db/pool";
import { migrateDb } from "../db/migrate";
import { logger } from "../logger";

async function main() {
  const pool = getPool();
  try {
    const res = await migrateDb({ pool, logger });
    // Keep CLI output stable and simple for scripting.
    console.log(JSON.stringify({ ok: true, applied: res.applied }, null, 2));
  } finally {
    await closePool();
  }
}

main().catch((err: unknown) => {
  console.error(JSON.stringify({ ok: false, error: err instanceof Error ? err.message : String(err) }, null, 2));
  process.exit(1);
});
