import { promises as fs } from "fs";
import type { Pool } from "pg";

export async function applySqlFile(pool: Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
