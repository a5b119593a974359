// CLI wiring: option parsing (commander), config, directory resolution, then one
// PamManager action. run() returns the exit status instead of exiting, so tests drive it
// in-process; cli.ts is the only place that touches process.exitCode.
import { Command, CommanderError, Option } from "commander";
import { z } from "zod";
import { loadConfig } from "./config/loader.js";
import { resolveDirectories, runningAsRoot } from "./store/directory.js";
import { ServiceStore } from "./store/service-store.js";
import { ACTIONS, MUTATING_ACTIONS, PamManager } from "./manager.js";
import { validateInput } from "./pam/validate.js";
import { formatJson, formatText } from "./output.js";
import { PamError, exitCodeFor } from "./shared/errors.js";
import { RULE_TYPES } from "./types/rule.js";
import { logger } from "./logger.js";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Defaults to checking the effective UID. */
  isRoot?: () => boolean;
  cwd?: string;
  now?: () => Date;
}

type CliOptions = {
  action?: string;
  service?: string;
  type?: string;
  control?: string;
  module?: string;
  args?: string;
  position?: string;
  dir?: string;
  config?: string;
  json?: boolean;
};

export function buildProgram(): Command {
  return new Command("pam-manager")
    .description("Inspect and edit Linux PAM service configuration files")
    .addOption(new Option("--action <action>", "Action to perform").choices(ACTIONS).makeOptionMandatory())
    .option("--service <name>", "PAM service name (file in the PAM directory)")
    .option("--type <type>", `Rule type (${RULE_TYPES.join(", ")})`)
    .option("--control <flag>", "Control flag (required, requisite, sufficient, optional, include, substack or [value=action ...])")
    .option("--module <module>", "PAM module name or path")
    .option("--args <args>", "Module arguments, space separated")
    .addOption(new Option("--position <position>", "Where to add the rule").choices(["start", "end"]).default("end"))
    .option("--dir <path>", "Use this PAM directory instead of the resolved one")
    .option("--config <path>", "Config file (default: $PAM_MANAGER_CONFIG or ~/.config/pam-manager/config.yaml)")
    .option("--json", "Print the result as JSON");
}

export async function run(argv: string[], io: CliIO): Promise<number> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    throw err;
  }

  const opts = program.opts<CliOptions>();
  try {
    const action = validateInput(z.enum(ACTIONS), opts.action);
    const { config } = loadConfig(opts.config);
    const isRoot = (io.isRoot ?? runningAsRoot)();
    const dirs = resolveDirectories(config, {
      isRoot,
      mutating: MUTATING_ACTIONS.has(action),
      override: opts.dir,
      cwd: io.cwd,
    });
    logger.debug({ action, pamDir: dirs.pamDir, isRoot }, "Directory resolved");

    const manager = new PamManager(new ServiceStore(dirs, io.now), dirs);
    const result = await manager.run(action, {
      service: opts.service,
      type: opts.type,
      control: opts.control,
      module: opts.module,
      args: opts.args,
      position: opts.position,
    });

    const json = opts.json ?? config.output.json;
    io.stdout(`${json ? formatJson(result) : formatText(result)}\n`);
    return 0;
  } catch (err) {
    if (err instanceof PamError) {
      logger.debug({ code: err.code, context: err.context }, "Action failed");
      io.stderr(`Error [${err.code}]: ${err.message}\n`);
      return exitCodeFor(err);
    }
    logger.error({ error: err }, "Unexpected failure");
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
