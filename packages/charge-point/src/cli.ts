#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { createLogger, DEFAULT_CALL_TIMEOUT_MS, JsonSchemaValidator } from "@ocpp-lite/protocol";
import { ChargePoint } from "./charge-point.js";

export async function runCli(argv = hideBin(process.argv)): Promise<void> {
  const args = await yargs(argv)
    .scriptName("ocpp-point")
    .usage("$0 --uri <ws-url> --model <model> --vendor <vendor> --serial-number <serial>")
    .option("uri", { type: "string", demandOption: true, describe: "WebSocket URL of the central system" })
    .option("model", { type: "string", demandOption: true, describe: "Model of the charge point" })
    .option("vendor", { type: "string", demandOption: true, describe: "Vendor of the charge point" })
    .option("serial-number", {
      type: "string",
      demandOption: true,
      describe: "Serial number; the central system registers the device under it",
    })
    .option("firmware-version", { type: "string" })
    .option("schema-dir", { type: "string", describe: "Directory of JSON schemas to validate with" })
    .option("call-timeout-ms", { type: "number", default: DEFAULT_CALL_TIMEOUT_MS })
    .strict()
    .help()
    .parseAsync();

  const logger = createLogger(`point:${args.serialNumber}`);
  const point = new ChargePoint({
    uri: args.uri,
    model: args.model,
    vendor: args.vendor,
    serialNumber: args.serialNumber,
    firmwareVersion: args.firmwareVersion,
    validator: new JsonSchemaValidator({ schemaDir: args.schemaDir, logger }),
    callTimeoutMs: args.callTimeoutMs,
    logger,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, closing connection`);
    point.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await point.connect();
  logger.info("Connection closed");
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  runCli().catch((error: unknown) => {
    createLogger("point-cli").error("Charge point failed", error);
    process.exitCode = 1;
  });
}
