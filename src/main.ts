#!/usr/bin/env node
import "dotenv/config";
import { handleStartupFailure, startNotifier } from "./app.js";

async function main() {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.info({ message: "notifier_stop_requested", signal });
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  await startNotifier({ signal: controller.signal });
}

main().catch((error) => handleStartupFailure(error));
