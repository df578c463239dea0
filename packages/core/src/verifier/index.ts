export { ConnectivityVerifier, describeProbeFailure } from "./connectivity-verifier";
export type { ConnectivityVerifierOptions } from "./connectivity-verifier";
