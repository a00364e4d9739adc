// src/lib/db.ts
import { Pool } from "pg";

// Connects lazily on the first query.
const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  ssl: process.env.DATABASE_SSL === "false" ? false : { rejectUnauthorized: false },
});

export default pool;
