import ora, { type Ora } from "ora";
import chalk from "chalk";

// stdout carries the generated document, so every status line goes to stderr.
const write = (...parts: unknown[]) => console.error(...parts);

let spinner: Ora | null = null;

function pause(): boolean {
  if (spinner?.isSpinning) {
    spinner.stop();
    return true;
  }
  return false;
}

export const logger = {
  info(message: string) {
    const resume = pause();
    write(chalk.blue("ℹ"), message);
    if (resume) spinner?.start();
  },

  success(message: string) {
    pause();
    write(chalk.green("✓"), message);
  },

  warn(message: string) {
    const resume = pause();
    write(chalk.yellow("⚠"), message);
    if (resume) spinner?.start();
  },

  error(message: string) {
    pause();
    write(chalk.red("✗"), message);
  },

  debug(message: string) {
    if (!process.env.DEBUG) return;
    const resume = pause();
    write(chalk.gray("🔍"), message);
    if (resume) spinner?.start();
  },

  step(step: number, total: number, message: string) {
    const resume = pause();
    write(chalk.dim(`[${step}/${total}]`), message);
    if (resume) spinner?.start();
  },

  startSpinner(message: string): Ora {
    spinner = ora({
      text: message,
      color: "cyan",
      stream: process.stderr,
    }).start();
    return spinner;
  },

  succeedSpinner(message: string) {
    if (spinner) {
      spinner.succeed(message);
      spinner = null;
    }
  },

  failSpinner(message: string) {
    if (spinner) {
      spinner.fail(message);
      spinner = null;
    }
  },

  header(title: string) {
    write();
    write(chalk.bold.cyan(`═══ ${title} ═══`));
    write();
  },

  divider() {
    write(chalk.dim("─".repeat(50)));
  },

  label(label: string, value: string | number) {
    write(chalk.gray(`${label}:`), value);
  },
};

export default logger;
