export type { IOutputService } from "./output.interface";
export type { IPromptService } from "./prompt.interface";
export type { IPublicIpService } from "./public-ip.interface";
