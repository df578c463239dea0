import type { IRemediationPrompt } from "@portwarden/core";

export interface IPromptService extends IRemediationPrompt {
  /**
   * Ask for a selection string such as "1,3-5" or "all".
   */
  askSelection(message: string): Promise<string>;

  /**
   * Require the user to type a confirmation word.
   */
  askTypedConfirmation(message: string, word: string): Promise<boolean>;
}
