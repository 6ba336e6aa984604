/**
 * Loads .env.local from the repo root for local runs
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const ENV_FILE = resolve(__dirname, "../../../.env.local");

export function loadLocalEnv(): void {
  config({ path: ENV_FILE });
}
