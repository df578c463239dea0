/**
 * Interactive remediation prompt.
 */
export interface IRemediationPrompt {
  askYesNo(message: string): Promise<boolean>;
}
