export type BackgroundRequest = {
  prompt: string;
  /** Where the upstream should deliver the completion event. */
  webhookUrl: string;
};

export type BackgroundResponse = {
  id: string;
  status: string;
};

/**
 * A completion service that runs prompts in the background and reports the
 * outcome through a signed webhook.
 */
export interface CompletionClient {
  readonly name: string;
  createBackgroundResponse(request: BackgroundRequest): Promise<BackgroundResponse>;
  /** Release timers or connections. */
  shutdown?(): void;
}
