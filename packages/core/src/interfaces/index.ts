export type { IResourceProvider } from "./resource-provider.interface";
export type { ITcpProbe } from "./tcp-probe.interface";
export type { IRemediationPrompt } from "./prompt.interface";
