/**
 * Logging Abstraction
 *
 * Workflow runs log through @actions/core so groups and annotations render
 * in the Actions UI; local runs fall back to the console.
 */

import * as core from "@actions/core";

/**
 * Whether the action is running inside a workflow job
 */
const isGitHubActions = (): boolean => {
  return process.env.GITHUB_ACTIONS === "true";
};

/**
 * Logger shared by the resolver, controller and executor
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: Error): void;
  debug(message: string): void;
  group(name: string): void;
  groupEnd(): void;
  /** Echo an external command before it runs */
  command(executable: string, args: readonly string[]): void;
}

/**
 * Render a command line for the log. Arguments containing whitespace are quoted.
 */
export function formatCommand(executable: string, args: readonly string[]): string {
  const rendered = args.map((arg) => (/\s/.test(arg) ? JSON.stringify(arg) : arg));
  return [executable, ...rendered].join(" ");
}

/**
 * Workflow logger; groups and warnings render as Actions annotations
 */
class ActionsLogger implements Logger {
  info(message: string): void {
    core.info(message);
  }

  warn(message: string): void {
    core.warning(message);
  }

  error(message: string, error?: Error): void {
    if (error) {
      core.error(`${message}: ${error.message}`);
      if (error.stack) {
        core.debug(error.stack);
      }
    } else {
      core.error(message);
    }
  }

  debug(message: string): void {
    core.debug(message);
  }

  group(name: string): void {
    core.startGroup(name);
  }

  groupEnd(): void {
    core.endGroup();
  }

  command(executable: string, args: readonly string[]): void {
    core.info(`[command]${formatCommand(executable, args)}`);
  }
}

/**
 * Console logger for running the entry script outside a workflow
 */
class ConsoleLogger implements Logger {
  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  error(message: string, error?: Error): void {
    if (error) {
      console.error(`❌ ${message}:`, error);
    } else {
      console.error(`❌ ${message}`);
    }
  }

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`🔍 ${message}`);
    }
  }

  group(name: string): void {
    console.group(name);
  }

  groupEnd(): void {
    console.groupEnd();
  }

  command(executable: string, args: readonly string[]): void {
    console.log(`$ ${formatCommand(executable, args)}`);
  }
}

/**
 * Pick the logger for the current environment
 */
export function createLogger(): Logger {
  return isGitHubActions() ? new ActionsLogger() : new ConsoleLogger();
}

/**
 * Default logger instance
 */
export const logger = createLogger();
