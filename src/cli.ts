#!/usr/bin/env node

import { defineCommand, runMain } from "citty";
import { findService, loadConfig } from "./config/loader.js";
import type { ResolvedConfig } from "./config/types.js";
import { runUntilSignal } from "./core/run.js";
import { probe } from "./health/checkers.js";
import { WakeCoordinator } from "./wake/coordinator.js";
import { sendMagicPacket } from "./wake/magic-packet.js";
import { ConfigError } from "./utils/errors.js";
import { formatAddress } from "./utils/net.js";
import { createLogger, isLogLevel, LOG_LEVELS } from "./utils/logger.js";

const configArg = {
  config: { type: "string", description: "Path to wakeproxy config file" },
} as const;

function loadOrExit(configPath: string | undefined): ResolvedConfig {
  try {
    return loadConfig({ configPath });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`❌ ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const start = defineCommand({
  meta: { name: "start", description: "Run the proxy in the foreground" },
  args: {
    ...configArg,
    "log-level": { type: "string", description: `Override log level (${LOG_LEVELS.join(", ")})` },
  },
  async run({ args }) {
    const config = loadOrExit(args.config);
    const override: string | undefined = args["log-level"];
    let level = config.logLevel;
    if (override) {
      if (!isLogLevel(override)) {
        console.error(`❌ Unknown log level: ${override}`);
        process.exit(1);
      }
      level = override;
    }

    const logger = createLogger("wakeproxy", level);
    const exitCode = await runUntilSignal(config, logger);
    process.exit(exitCode);
  },
});

const check = defineCommand({
  meta: { name: "check", description: "Validate the config and list services" },
  args: { ...configArg },
  run({ args }) {
    const config = loadOrExit(args.config);

    console.log(`✅ ${config.configPath} is valid`);
    console.log("");
    for (const s of config.services) {
      console.log(
        `  ${s.name}: ${s.protocol.toUpperCase()} :${s.proxyPort} -> ${formatAddress(s.targetHost, s.targetPort)} (mac ${s.macAddress})`,
      );
    }
    if (config.status) {
      console.log("");
      console.log(`  status endpoint: http://${config.status.host}:${config.status.port}/api/status`);
    }
  },
});

const status = defineCommand({
  meta: { name: "status", description: "Probe every target once" },
  args: {
    ...configArg,
    json: { type: "boolean", description: "Output as JSON" },
  },
  async run({ args }) {
    const config = loadOrExit(args.config);
    const results = await Promise.all(
      config.services.map(async (s) => ({
        name: s.name,
        target: formatAddress(s.targetHost, s.targetPort),
        proxyPort: s.proxyPort,
        protocol: s.protocol,
        reachable: await probe(s.targetHost, s.targetPort, s.connectionTimeoutMs),
      })),
    );

    if (args.json) {
      console.log(JSON.stringify({ services: results }, null, 2));
      return;
    }

    console.log("═══════════════════════════════════════");
    console.log("       Target Status");
    console.log("═══════════════════════════════════════");
    console.log("");
    for (const r of results) {
      const icon = r.reachable ? "✅" : "❌";
      console.log(`${icon} ${r.name} (${r.target}): ${r.reachable ? "Reachable" : "Unreachable"}`);
      console.log(`   └─ proxy: ${r.protocol} :${r.proxyPort}`);
    }
    console.log("");
  },
});

const wake = defineCommand({
  meta: { name: "wake", description: "Wake a service's target host" },
  args: {
    service: { type: "positional", description: "Service name", required: true },
    ...configArg,
    wait: {
      type: "boolean",
      default: true,
      description: "Wait for the target to come up (--no-wait only sends the packet)",
    },
  },
  async run({ args }) {
    const config = loadOrExit(args.config);
    const service = findService(config.services, args.service);
    if (!service) {
      console.error(`❌ Unknown service: ${args.service}`);
      process.exit(1);
    }

    const delivery = { address: service.wakeAddress, port: service.wakePort };
    if (!args.wait) {
      await sendMagicPacket(service.macAddress, delivery);
      console.log(`📨 Wake packet sent to ${service.macAddress}`);
      return;
    }

    const target = formatAddress(service.targetHost, service.targetPort);
    console.log(`⏳ Waking ${service.name} (${target})...`);
    const coordinator = new WakeCoordinator({ logger: createLogger("wake", config.logLevel) });
    const awake = await coordinator.ensureAwake(
      service.macAddress,
      service.targetHost,
      service.targetPort,
      service.wakeTimeoutMs,
      delivery,
    );

    if (!awake) {
      console.error(`❌ ${target} did not become reachable within ${service.wakeTimeoutMs / 1000}s`);
      process.exit(1);
    }
    console.log(`✅ ${service.name} is awake`);
  },
});

const init = defineCommand({
  meta: { name: "init", description: "Print a config template" },
  run() {
    const template = {
      version: 1,
      logLevel: "info",
      services: {
        ssh: {
          targetHost: "192.168.1.50",
          targetPort: 22,
          proxyPort: 2222,
          macAddress: "00:11:22:33:44:55",
          protocol: "tcp",
          wakeTimeout: 60,
          healthCheckInterval: 10,
          connectionTimeout: 5,
        },
      },
    };

    console.log("# wakeproxy.config.json template");
    console.log(JSON.stringify(template, null, 2));
    console.log("");
    console.log("Save this as wakeproxy.config.json and point it at your hosts.");
  },
});

const main = defineCommand({
  meta: {
    name: "wakeproxy",
    version: "0.1.0",
    description: "TCP/UDP proxy that wakes sleeping hosts on demand",
  },
  subCommands: {
    start,
    check,
    status,
    wake,
    init,
  },
});

runMain(main);
