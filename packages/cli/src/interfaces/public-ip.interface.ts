/**
 * Detection of the caller's own public address.
 */
export interface IPublicIpService {
  detect(): Promise<string>;
}
