import { config as dotenvConfig } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from monorepo root (cwd is apps/api/ in workspace mode)
const _here = dirname(fileURLToPath(import.meta.url)); // → apps/api/src
dotenvConfig({ path: resolve(_here, "../../../.env") });
dotenvConfig(); // Also try local apps/api/.env if present

import { createApp } from "./app";
import { loadEnv } from "./env";
import { logAudit } from "./infra/auditLogger";

const env = loadEnv(process.env);

const app = createApp(env);

app.listen(env.PORT, () => {
  logAudit({ level: "info", event: "server_started", detail: `API listening on http://localhost:${env.PORT}` });
});
