import { MessageKind, Result } from "@core/types";

/**
 * What the companion device reports from GET /api/status
 */
export type RemoteStatus = {
  device: string;
  petName?: string;
  mood?: string;
  hunger?: number;
  happiness?: number;
  health?: number;
  online: boolean;
};

/**
 * HTTP client for the paired device
 */
export interface ICompanionClient {
  isConfigured(): boolean;

  sendMessage(text: string, type?: MessageKind): Promise<Result<void>>;

  sendPoke(): Promise<Result<void>>;

  sendFeed(): Promise<Result<void>>;

  getRemoteStatus(): Promise<Result<RemoteStatus>>;
}
