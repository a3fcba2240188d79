/**
 * Outbound channel for domain events. Commands publish after a verb succeeds;
 * adapters decide whether anyone is listening.
 */
export interface MessageBus {
  publish(channel: string, event: object): Promise<void>;
}

export const SERVER_CHANNEL = "server";

export function gameChannel(gameId: string): string {
  return `game:${gameId}`;
}
