#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { createLogger, JsonSchemaValidator } from "@ocpp-lite/protocol";
import { createAdminServer } from "./admin-http.js";
import { CentralSystem } from "./central-system.js";
import { resolveCentralConfig, type CentralConfig } from "./config.js";
import { HttpDeviceAdmin } from "./http-admin.js";
import { startMcpStdio } from "./mcp.js";

const log = createLogger("central-cli");

export async function serve(config: CentralConfig): Promise<void> {
  const validator = new JsonSchemaValidator({
    schemaDir: config.schemaDir,
    logger: createLogger("validator"),
  });
  const central = new CentralSystem({
    host: config.host,
    port: config.wsPort,
    heartbeatInterval: config.heartbeatInterval,
    callTimeoutMs: config.callTimeoutMs,
    validator,
  });
  await central.listen();

  const http = createAdminServer(central);
  const address = await http.listen({ host: config.host, port: config.httpPort });
  log.info(`Admin API listening on ${address}`);

  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, shutting down`);
    Promise.all([http.close(), central.close()]).then(
      () => process.exit(0),
      (error: unknown) => {
        log.error("Shutdown failed", error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export async function runCli(argv = hideBin(process.argv)): Promise<void> {
  const config = resolveCentralConfig();

  await yargs(argv)
    .scriptName("ocpp-central")
    .option("admin-url", {
      type: "string",
      default: config.adminUrl,
      describe: "Base URL of the central system's admin API",
    })
    .command(
      "serve",
      "Run the WebSocket central system and its HTTP admin API",
      (command) =>
        command
          .option("host", { type: "string", default: config.host })
          .option("port", { type: "number", default: config.wsPort, describe: "WebSocket port" })
          .option("http-port", { type: "number", default: config.httpPort })
          .option("heartbeat-interval", {
            type: "number",
            default: config.heartbeatInterval,
            describe: "Seconds between device heartbeats",
          })
          .option("call-timeout-ms", { type: "number", default: config.callTimeoutMs })
          .option("schema-dir", { type: "string", default: config.schemaDir }),
      async (args) => {
        await serve({
          ...config,
          host: args.host,
          wsPort: args.port,
          httpPort: args.httpPort,
          heartbeatInterval: args.heartbeatInterval,
          callTimeoutMs: args.callTimeoutMs,
          schemaDir: args.schemaDir,
        });
      },
    )
    .command(
      "mcp",
      "Serve the device-admin tools over MCP stdio",
      (command) => command,
      async (args) => {
        await startMcpStdio({ admin: HttpDeviceAdmin.fromUrl(args.adminUrl) });
      },
    )
    .command(
      "devices",
      "List connected charge points",
      (command) => command,
      async (args) => {
        print(await HttpDeviceAdmin.fromUrl(args.adminUrl).listDevices());
      },
    )
    .command(
      "get-configuration <device> [keys..]",
      "Read configuration keys from a charge point",
      (command) =>
        command
          .positional("device", { type: "string", demandOption: true })
          .positional("keys", { type: "string", array: true }),
      async (args) => {
        const admin = HttpDeviceAdmin.fromUrl(args.adminUrl);
        print(await admin.getConfiguration(args.device, args.keys));
      },
    )
    .command(
      "change-configuration <device> <key> <value>",
      "Change one configuration key on a charge point",
      (command) =>
        command
          .positional("device", { type: "string", demandOption: true })
          .positional("key", { type: "string", demandOption: true })
          .positional("value", { type: "string", demandOption: true }),
      async (args) => {
        const admin = HttpDeviceAdmin.fromUrl(args.adminUrl);
        print(await admin.changeConfiguration(args.device, args.key, args.value));
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  runCli().catch((error: unknown) => {
    log.error("Command failed", error);
    process.exitCode = 1;
  });
}
