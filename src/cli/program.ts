import { Command } from "commander";

import { ConfigError, loadConfig, resolveConfigPath } from "../config/config.js";
import type { GreeterConfig } from "../config/types.js";
import { danger, info, setVerbose, success } from "../globals.js";
import { monitorGreeter } from "../greeter/monitor.js";
import { setLogLevel } from "../logging.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { theme } from "../terminal/theme.js";

type ConfigOpts = { config?: string };
type RunOpts = ConfigOpts & { verbose?: boolean };

export function describeConfig(cfg: GreeterConfig): string[] {
  return [
    `homeserver: ${cfg.matrix.homeserver}`,
    `user: ${cfg.matrix.userId} (${cfg.matrix.accessToken ? "access token" : "password login"})`,
    `rooms: ${cfg.rooms.join(", ")}`,
    `notification room: ${cfg.notificationRoom ?? "off"}`,
    `homeserver allow-list: ${cfg.homeservers ? cfg.homeservers.allowList.join(", ") : "off"}`,
    `invites: ${cfg.invites ? cfg.invites.apiUrl : "static message"}`,
    `settle delay: ${cfg.greeting.settleDelayMinMs}-${cfg.greeting.settleDelayMaxMs}ms`,
    `retry: ${cfg.retry.attempts} attempts, ${cfg.retry.baseDelayMs}ms base delay`,
  ];
}

function loadConfigOrExit(opts: ConfigOpts, runtime: RuntimeEnv): GreeterConfig {
  try {
    return loadConfig({ path: opts.config });
  } catch (err) {
    if (err instanceof ConfigError) {
      runtime.error(danger(err.message));
      return runtime.exit(1);
    }
    throw err;
  }
}

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();

  program
    .name("matrix-greeter")
    .description("Welcome new members of Matrix rooms and send them onboarding invites");

  program
    .command("run")
    .description("Log in and greet members joining the configured rooms")
    .option("-c, --config <path>", "Config file (default: $GREETER_CONFIG or ./config.yaml)")
    .option("-v, --verbose", "Print ignored joins and other detail", false)
    .action(async (opts: RunOpts) => {
      const cfg = loadConfigOrExit(opts, runtime);
      setLogLevel(cfg.logging.level);
      setVerbose(opts.verbose === true || cfg.logging.verbose);

      const abort = new AbortController();
      const stop = (signal: NodeJS.Signals) => {
        runtime.log(info(`greeter: ${signal} received, stopping`));
        abort.abort();
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
      try {
        await monitorGreeter({ config: cfg, runtime, abortSignal: abort.signal });
      } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
      }
    });

  program
    .command("check-config")
    .description("Validate the config file and print a summary without secrets")
    .option("-c, --config <path>", "Config file (default: $GREETER_CONFIG or ./config.yaml)")
    .action((opts: ConfigOpts) => {
      const cfg = loadConfigOrExit(opts, runtime);
      runtime.log(theme.heading(resolveConfigPath(opts.config)));
      for (const line of describeConfig(cfg)) {
        runtime.log(`  ${line}`);
      }
      runtime.log(success("config OK"));
    });

  return program;
}
