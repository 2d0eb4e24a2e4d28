import { loadOrCreateConfig, localBaseUrl, publicBaseUrl } from "./config.js";
import { buildApp } from "./app.js";
import { ControlClient } from "./hooks/client.js";

const cfg = loadOrCreateConfig();
const localUrl = localBaseUrl(cfg);

// Avoid crashing with EADDRINUSE when a server is already running.
if (await new ControlClient(localUrl).health()) {
  console.log(`[remote-gate] already running on ${localUrl}`);
  process.exit(0);
}

const app = await buildApp({
  retention: cfg.retention,
  dispatch: cfg.dispatch,
});

try {
  await app.listen({ host: cfg.server.bind, port: cfg.server.port });
} catch (e) {
  const code = e instanceof Error && "code" in e ? e.code : undefined;
  if (code === "EADDRINUSE") {
    console.error(`[remote-gate] port already in use: ${cfg.server.bind}:${cfg.server.port}`);
    console.error(`[remote-gate] to find the process: lsof -iTCP:${cfg.server.port} -sTCP:LISTEN -P`);
    process.exit(1);
  }
  throw e;
}

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`\n[remote-gate] shutting down (${signal})...`);
  try {
    await app.close();
  } catch (e) {
    console.error(`[remote-gate] close failed: ${e instanceof Error ? e.message : String(e)}`);
  } finally {
    process.exit(0);
  }
}
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

console.log(`[remote-gate] listening on ${localUrl} (dispatch: ${cfg.dispatch.backend})`);
if (cfg.server.publicUrl) console.log(`[remote-gate] notification links use ${publicBaseUrl(cfg)}`);
else console.log(`[remote-gate] set server.publicUrl (or RG_PUBLIC_URL) to your tunnel URL so links open on your phone`);
