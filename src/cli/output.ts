import chalk from "chalk";

/**
 * Global output format (set by --json flag)
 */
let globalJsonMode = false;

/**
 * Debug tracing (set by --verbose or WEFT_DEBUG=1)
 */
let verboseFlag = false;

export function setJsonMode(enabled: boolean): void {
  globalJsonMode = enabled;
}

export function setVerboseMode(enabled: boolean): void {
  verboseFlag = enabled;
}

/**
 * Debug output is on when either:
 * - --verbose was given
 * - WEFT_DEBUG=1 environment variable
 */
export function isVerbose(): boolean {
  return process.env.WEFT_DEBUG === "1" || verboseFlag;
}

/**
 * Output data - JSON if --json flag, otherwise formatted
 */
export function output(data: unknown, formatter?: () => void): void {
  if (globalJsonMode) {
    console.log(JSON.stringify(data, null, 2));
  } else if (formatter) {
    formatter();
  } else {
    console.log(data);
  }
}

/**
 * Output success message (stderr, stdout may carry merged text)
 */
export function success(message: string, data?: Record<string, unknown>): void {
  if (globalJsonMode) {
    console.error(JSON.stringify({ success: true, message, ...data }));
  } else {
    console.error(chalk.green("OK"), message);
  }
}

/**
 * Output error message
 */
export function error(message: string, details?: unknown): void {
  if (globalJsonMode) {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red("✗"), message);
    if (details) {
      console.error(chalk.gray(String(details)));
    }
  }
}

/**
 * Output warning message
 */
export function warn(message: string): void {
  if (globalJsonMode) {
    // Warnings are suppressed in JSON mode
  } else {
    console.error(chalk.yellow("⚠"), message);
  }
}

/**
 * Output info message
 */
export function info(message: string): void {
  if (globalJsonMode) {
    // Info messages suppressed in JSON mode
  } else {
    console.error(chalk.blue("ℹ"), message);
  }
}

/**
 * Debug line on stderr, only in verbose mode
 */
export function debug(message: string): void {
  if (isVerbose()) {
    console.error(`[DEBUG] ${message}`);
  }
}
