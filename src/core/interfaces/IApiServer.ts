import { Result } from "@core/types";

/**
 * HTTP API the companion device talks to
 */
export interface IApiServer {
  /**
   * Start listening
   * @returns WebError.portInUse when the port is taken
   */
  start(): Promise<Result<void>>;

  /**
   * Stop listening and close open connections
   */
  stop(): Promise<Result<void>>;

  isRunning(): boolean;

  getServerUrl(): string;

  getPort(): number;
}
