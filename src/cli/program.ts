/**
 * scope-audit CLI
 *
 *   scope-audit run <roots...> [--include-subscriptions] [--include-resource-groups]
 *     [--include-eligible] [--include-policy] [--no-rbac] [--concurrency <n>]
 *     [--timeout <ms>] [--out-dir <dir>] [--json]
 *
 * Exit codes: 0 complete, 1 configuration or fatal error, 2 incomplete report.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Command } from "commander";
import { resolveConfig, toRunOptions, type ScopeAuditConfig } from "../config.js";
import { createCredentialsManager } from "../credentials/index.js";
import { onAuditDiagnosticEvent } from "../diagnostics.js";
import { AzureScopeDirectory } from "../directory/azure-directory.js";
import type { ScopeDirectoryClient } from "../directory/types.js";
import { createAuditEngine } from "../engine/index.js";
import { ConfigurationError, formatErrorMessage } from "../errors.js";
import { toAssignmentsCsv, toScopesCsv } from "../export/index.js";
import { createAuditLogger, type AuditLogger, type LogTransport } from "../logging/index.js";
import type { Report } from "../types.js";
import { plainTheme, theme } from "./theme.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INCOMPLETE = 2;

type RunCommandOptions = {
  includeSubscriptions?: boolean;
  includeResourceGroups?: boolean;
  includeEligible?: boolean;
  includePolicy?: boolean;
  rbac?: boolean;
  concurrency?: number;
  timeout?: number;
  outDir?: string;
  json?: boolean;
  logLevel?: string;
  credentialMethod?: string;
  subscription?: string;
  tenant?: string;
  diagnostics?: boolean;
};

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
  env: Record<string, string | undefined>;
  color: boolean;
};

export type CliDependencies = {
  io?: Partial<CliIo>;
  /** Directory used for the run. Defaults to the Azure Resource Manager directory. */
  createDirectory?: (config: ScopeAuditConfig, logger: AuditLogger) => ScopeDirectoryClient;
  /** Log transports. Defaults to the console transport (stderr). */
  logTransports?: LogTransport[];
  signal?: AbortSignal;
};

function defaultIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    env: process.env,
    color: process.stdout.isTTY ?? false,
  };
}

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

function createAzureDirectory(config: ScopeAuditConfig, logger: AuditLogger): ScopeDirectoryClient {
  const credentials = createCredentialsManager({
    defaultSubscription: config.defaultSubscription,
    defaultTenantId: config.defaultTenantId,
    credentialMethod: config.credentialMethod,
  });
  return new AzureScopeDirectory(credentials, {
    defaultSubscription: config.defaultSubscription,
    logger,
  });
}

export function formatSummary(report: Report, colors: typeof plainTheme = plainTheme): string {
  const lines: string[] = [];
  lines.push(
    `Scopes: ${report.stats.scopesDiscovered} discovered, ${report.stats.scopesCollected} collected`,
  );
  lines.push(`Records: ${report.records.length}`);
  for (const [group, counts] of Object.entries(report.summaries)) {
    const entries = Object.entries(counts);
    if (entries.length === 0) continue;
    lines.push(colors.muted(`  ${group}: ${entries.map(([key, count]) => `${key}=${count}`).join(", ")}`));
  }
  if (report.skipped.length > 0) {
    lines.push(colors.warn(`Skipped: ${report.skipped.length}`));
    for (const skip of report.skipped) {
      const category = skip.category ? ` ${skip.category}` : "";
      lines.push(colors.warn(`  ${skip.scopeId} (${skip.stage}${category}): ${skip.reason} - ${skip.message}`));
    }
  }
  if (report.incomplete) {
    lines.push(colors.error("Report is incomplete: the run was cancelled or hit its deadline"));
  }
  return `${lines.join("\n")}\n`;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const io: CliIo = { ...defaultIo(), ...deps.io };
  const colors = io.color ? theme : plainTheme;
  const program = new Command();

  program
    .name("scope-audit")
    .description("Audit role grants and policy assignments across an Azure scope hierarchy");

  program
    .command("run")
    .description("Walk the hierarchy from the given roots and collect assignments")
    .argument("<roots...>", "Root scopes: management group names or scope paths")
    .option("--include-subscriptions", "Expand subscriptions into resource groups")
    .option("--include-resource-groups", "Expand resource groups into resources")
    .option("--include-eligible", "Collect eligible (time-bound) role grants")
    .option("--include-policy", "Collect policy assignments")
    .option("--no-rbac", "Skip RBAC role grants")
    .option("--concurrency <n>", "Scopes collected at once", parseInteger)
    .option("--timeout <ms>", "Deadline for the whole run in milliseconds", parseInteger)
    .option("--out-dir <dir>", "Write assignments.csv and scopes.csv to this directory")
    .option("--json", "Print the full report as JSON")
    .option("--log-level <level>", "trace, debug, info, warn, error or fatal")
    .option("--credential-method <method>", "default, cli, service-principal or managed-identity")
    .option("--subscription <id>", "Subscription used for management-group API clients")
    .option("--tenant <id>", "Tenant id for credential resolution")
    .option("--diagnostics", "Log every directory API call")
    .action(async (roots: string[], _options: unknown, command: Command) => {
      const opts = command.opts<RunCommandOptions>();

      let config: ScopeAuditConfig;
      try {
        config = resolveConfig(
          {
            roots,
            includeSubscriptions: opts.includeSubscriptions,
            includeResourceGroups: opts.includeResourceGroups,
            includeEligibleGrants: opts.includeEligible,
            includePolicyDomain: opts.includePolicy,
            includeRbac: opts.rbac,
            concurrency: opts.concurrency,
            timeoutMs: opts.timeout,
            logLevel: opts.logLevel,
            credentialMethod: opts.credentialMethod,
            defaultSubscription: opts.subscription,
            defaultTenantId: opts.tenant,
            diagnostics: opts.diagnostics ? { enabled: true } : undefined,
          },
          io.env,
        );
      } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        io.stderr(`${colors.error(error.message)}\n`);
        io.setExitCode(EXIT_FAILURE);
        return;
      }

      const loggerFor = (subsystem: string) =>
        createAuditLogger(subsystem, { level: config.logLevel, transports: deps.logTransports });
      const logger = loggerFor("cli");
      const stopDiagnostics = config.diagnostics?.enabled ? attachDiagnostics(loggerFor("api")) : undefined;

      try {
        const directory = (deps.createDirectory ?? createAzureDirectory)(config, loggerFor("azure"));
        const engine = createAuditEngine(directory, { logger: loggerFor("engine") });
        const report = await engine.run(config.roots, { ...toRunOptions(config), signal: deps.signal });

        if (opts.outDir) {
          await mkdir(opts.outDir, { recursive: true });
          await writeFile(join(opts.outDir, "assignments.csv"), toAssignmentsCsv(report), "utf8");
          await writeFile(join(opts.outDir, "scopes.csv"), toScopesCsv(report), "utf8");
          logger.info(`Wrote CSV files to ${opts.outDir}`);
        }

        if (opts.json) {
          io.stdout(`${JSON.stringify(report, null, 2)}\n`);
        } else {
          io.stdout(formatSummary(report, colors));
        }

        io.setExitCode(report.incomplete ? EXIT_INCOMPLETE : EXIT_OK);
      } catch (error) {
        const message = error instanceof ConfigurationError
          ? error.message
          : `Audit failed: ${formatErrorMessage(error)}`;
        io.stderr(`${colors.error(message)}\n`);
        io.setExitCode(EXIT_FAILURE);
      } finally {
        stopDiagnostics?.();
      }
    });

  return program;
}

function attachDiagnostics(logger: AuditLogger): () => void {
  return onAuditDiagnosticEvent((event) => {
    const meta = { durationMs: event.durationMs, scopeId: event.scopeId, statusCode: event.statusCode };
    if (event.type === "audit.api.error") {
      logger.warn(`${event.service}.${event.operation} failed: ${event.error ?? ""}`, meta);
    } else {
      logger.debug(`${event.service}.${event.operation}`, meta);
    }
  });
}
