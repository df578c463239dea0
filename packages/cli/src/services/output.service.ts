/**
 * Output Service
 *
 * chalk for colour, ora for spinners. Log lines printed while a spinner is
 * running stop the spinner first so the two never interleave.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { LogCallback } from "@portwarden/core";
import type { IOutputService } from "../interfaces";

export type WriteLine = (line: string) => void;

export class OutputService implements IOutputService {
  private spinner: Ora | undefined;

  constructor(private readonly write: WriteLine = (line) => console.log(line)) {}

  readonly log: LogCallback = (message, level = "info") => {
    switch (level) {
      case "success":
        this.success(message);
        break;
      case "warn":
        this.warn(message);
        break;
      case "error":
        this.error(message);
        break;
      case "detail":
        this.detail(message);
        break;
      default:
        this.info(message);
    }
  };

  header(title: string, icon?: string): void {
    this.print(chalk.blue.bold(icon ? `${icon} ${title}` : title));
  }

  section(title: string): void {
    this.print("");
    this.print(chalk.bold(`── ${title} ──`));
  }

  info(message: string): void {
    this.print(`${chalk.blue("ℹ")}  ${message}`);
  }

  success(message: string): void {
    this.print(`${chalk.green("✓")}  ${chalk.green(message)}`);
  }

  warn(message: string): void {
    this.print(`${chalk.yellow("⚠")}  ${chalk.yellow(message)}`);
  }

  error(message: string): void {
    this.print(`${chalk.red("✗")}  ${chalk.red(message)}`);
  }

  detail(message: string): void {
    this.print(chalk.gray(`     ${message}`));
  }

  dim(message: string): void {
    this.print(chalk.gray(message));
  }

  newline(): void {
    this.print("");
  }

  table(headers: string[], rows: string[][]): void {
    const widths = headers.map((header, col) =>
      Math.max(header.length, ...rows.map((row) => (row[col] ?? "").length))
    );
    const format = (cells: string[]) => cells.map((cell, col) => cell.padEnd(widths[col])).join("  ").trimEnd();

    this.print(chalk.bold(format(headers)));
    this.print(chalk.gray(widths.map((w) => "─".repeat(w)).join("  ")));
    for (const row of rows) {
      this.print(format(row));
    }
  }

  startSpinner(text: string): void {
    this.stopSpinner();
    this.spinner = ora(text).start();
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }

  private print(line: string): void {
    this.stopSpinner();
    this.write(line);
  }
}
