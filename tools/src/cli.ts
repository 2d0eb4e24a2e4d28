#!/usr/bin/env node
import qrcode from "qrcode-terminal";
import { configPath, loadOrCreateConfig, localBaseUrl, publicBaseUrl, type Config } from "../../server/src/config.js";
import { ControlClient } from "../../server/src/hooks/client.js";
import { runPermissionGate } from "../../server/src/hooks/gate.js";
import { runNotify, runSessionEnd, runSessionStart } from "../../server/src/hooks/notify.js";
import { parseHookPayload } from "../../server/src/hooks/payload.js";

function usage() {
  console.log(`remote-gate

Commands:
  start        Start the control-plane server (loopback, port 9876 unless configured)
  status       Show whether the server is running
  config       Print config path and the agent hook commands
  subscribe    Show the push topic URL (and QR code) to subscribe to on your phone
  hook <event> Run as an agent hook; reads the hook JSON from stdin
              Events: session-start, session-end, notify, permission
`);
}

function readStdin(timeoutMs = 2000): Promise<string> {
  return new Promise((resolve) => {
    let buf = "";
    let done = false;
    const finish = () => {
      if (done) return;
      done = true;
      resolve(buf);
    };
    process.stdin.setEncoding("utf8");
    process.stdin.on("data", (d: string) => (buf += d));
    process.stdin.on("end", finish);
    process.stdin.on("close", finish);
    // Don't hang if stdin never closes; the payload is a small JSON object.
    setTimeout(finish, timeoutMs).unref();
  });
}

async function runHook(event: string, cfg: Config): Promise<number> {
  const payload = parseHookPayload(await readStdin());
  if (!payload) return 0;
  const client = new ControlClient(localBaseUrl(cfg));

  switch (event) {
    case "session-start":
      await runSessionStart(payload, { config: cfg, client });
      return 0;
    case "session-end":
      await runSessionEnd(payload, client);
      return 0;
    case "notify":
      await runNotify(payload, { config: cfg, client });
      return 0;
    case "permission": {
      const out = await runPermissionGate(payload, { config: cfg, client });
      // No output means the agent shows its normal permission prompt.
      if (out) process.stdout.write(JSON.stringify(out) + "\n");
      return 0;
    }
    default:
      console.error(`[remote-gate] unknown hook event: ${event}`);
      return 2;
  }
}

async function main() {
  const cmd = process.argv[2] ?? "start";
  const cmdArgs = process.argv.slice(3);

  if (cmd === "help" || cmd === "--help" || cmd === "-h") {
    usage();
    return;
  }

  if (cmd === "config") {
    console.log(configPath());
    console.log(`
Agent hooks (add to the agent's settings):
  SessionStart      remote-gate hook session-start
  SessionEnd        remote-gate hook session-end
  Notification      remote-gate hook notify
  Stop              remote-gate hook notify
  PermissionRequest remote-gate hook permission   (timeout above ${Math.ceil(loadOrCreateConfig().gate.timeoutMs / 1000)}s)`);
    return;
  }

  if (cmd === "hook") {
    // Hooks must never break the agent: any failure exits 0 with nothing on stdout.
    try {
      process.exitCode = await runHook(cmdArgs[0] ?? "", loadOrCreateConfig());
    } catch (e) {
      console.error(`[remote-gate] hook failed: ${e instanceof Error ? e.message : String(e)}`);
      process.exitCode = 0;
    }
    return;
  }

  const cfg = loadOrCreateConfig();

  if (cmd === "status") {
    const url = localBaseUrl(cfg);
    const up = await new ControlClient(url).health();
    console.log(up ? `running on ${url}` : `not running (expected on ${url})`);
    if (!up) process.exitCode = 1;
    return;
  }

  if (cmd === "subscribe") {
    if (!cfg.push.topic) {
      console.error(`No push topic configured. Set push.topic in ${configPath()}`);
      process.exitCode = 1;
      return;
    }
    const url = `${cfg.push.server.replace(/\/+$/, "")}/${cfg.push.topic}`;
    console.log(`Subscribe to this topic in the ntfy app:\n  ${url}\n`);
    qrcode.generate(url, { small: true });
    console.log(`\nAction links in notifications point at ${publicBaseUrl(cfg)}`);
    return;
  }

  if (cmd === "start") {
    await import("../../server/src/index.js");
    return;
  }

  usage();
  process.exitCode = 2;
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
