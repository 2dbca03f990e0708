import "dotenv/config";
import * as fs from "fs";
import * as path from "path";
import { env } from "../src/config/env";
import { createPgPool } from "../src/infrastructure/database/pgPool";

async function createUsersTable() {
  const pool = createPgPool(env);
  if (!pool) {
    throw new Error("DB_HOST, DB_USER e DB_PASS precisam estar definidos");
  }

  console.log(`🔌 Conectando ao banco: ${env.DB_USER}@${env.DB_HOST}:${env.DB_PORT}/${env.DB_NAME}`);

  try {
    const sql = fs.readFileSync(path.join(__dirname, "../sql/users.sql"), "utf8");

    console.log("📝 Aplicando sql/users.sql...");
    await pool.query(sql);

    const { rows } = await pool.query("SELECT COUNT(*) AS total FROM users");
    console.log(`✅ Tabela users pronta (${rows[0]?.total ?? 0} registros)`);
  } finally {
    await pool.end();
  }
}

createUsersTable().catch((error) => {
  console.error("❌ Erro ao criar tabela users:", error);
  process.exit(1);
});
