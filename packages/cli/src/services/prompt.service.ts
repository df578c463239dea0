/**
 * Prompt Service
 *
 * Interactive questions through inquirer.
 */

import inquirer from "inquirer";
import type { IPromptService } from "../interfaces";

export class PromptService implements IPromptService {
  async askYesNo(message: string): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: "confirm",
        name: "confirmed",
        message,
        default: false,
      },
    ]);
    return confirmed;
  }

  async askSelection(message: string): Promise<string> {
    const { selection } = await inquirer.prompt<{ selection: string }>([
      {
        type: "input",
        name: "selection",
        message,
        validate: (input: string) => (input.trim() ? true : "No selection provided"),
      },
    ]);
    return selection;
  }

  async askTypedConfirmation(message: string, word: string): Promise<boolean> {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      {
        type: "input",
        name: "answer",
        message: `${message} Type ${word} to confirm:`,
      },
    ]);
    return answer.trim() === word;
  }
}
