import { Command } from 'commander';
import {
  type CheckOptions,
  type CheckerSettings,
  ExitCode,
  type LogLevel,
  Logger,
  runCheck,
} from '@helm-values-lint/core';

export type CliOptions = {
  valuesFile: string;
  helmChartsPath?: string;
  bomFile?: string;
  ext?: string[];
  prefix?: string[];
  ignore?: string[];
  verbose?: boolean;
};

export type CliDeps = {
  createLogger?: (level: LogLevel) => Logger;
  setExitCode?: (code: number) => void;
  cwd?: string;
};

function toSettings(options: CliOptions): Partial<CheckerSettings> {
  return {
    extensions: options.ext,
    valuesPrefixes: options.prefix,
    ignore: options.ignore,
  };
}

function toCheckOptions(options: CliOptions, cwd: string | undefined): CheckOptions | undefined {
  const base = { valuesFile: options.valuesFile, settings: toSettings(options), cwd };

  if (options.helmChartsPath !== undefined && options.bomFile === undefined) {
    return { ...base, chartPath: options.helmChartsPath };
  }
  if (options.bomFile !== undefined && options.helmChartsPath === undefined) {
    return { ...base, bomFile: options.bomFile };
  }
  return undefined;
}

export function createProgram(deps: CliDeps = {}): Command {
  const createLogger = deps.createLogger ?? ((level: LogLevel) => new Logger({ level }));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  return new Command('helm-values-lint')
    .description('Check Helm chart .Values references against a values file')
    .version('0.1.0')
    .requiredOption('--values-file <file>', 'values YAML file (e.g., values-dev.yaml)')
    .option('--helm-charts-path <dir>', 'directory containing the Helm chart templates')
    .option('--bom-file <file>', 'BOM manifest listing several charts')
    .option('--ext <ext...>', 'template file extensions to scan (default: .yaml .yml .tpl)')
    .option('--prefix <prefix...>', 'values prefixes to recognize (default: .Values)')
    .option('--ignore <glob...>', 'glob patterns to skip (default: node_modules and .git)')
    .option('--verbose', 'enable debug logging', false)
    .action(async (options: CliOptions) => {
      const logger = createLogger(options.verbose ? 'debug' : 'info');
      const checkOptions = toCheckOptions(options, deps.cwd);

      if (!checkOptions) {
        logger.error('Specify exactly one of --helm-charts-path or --bom-file');
        setExitCode(ExitCode.ConfigurationError);
        return;
      }

      const outcome = await runCheck(checkOptions, logger);
      setExitCode(outcome.exitCode);
    });
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}
