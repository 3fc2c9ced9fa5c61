// Imported first by the CLI entry so .env.local is in process.env before any module reads it.
import { config } from "dotenv";

config({ path: ".env.local" });
