/** Markup mode a message is rendered in. */
export type FormatMode = 'MarkdownV2' | 'plain';

/** Outcome of a single delivery attempt reported by a transport. */
export type SendOutcome =
    | { status: 'ok' }
    /** The remote endpoint asked us to wait before trying again. */
    | { status: 'rate_limited'; retryAfterSeconds: number }
    /** Timeout, connection loss or a remote 5xx; expected to pass on retry. */
    | { status: 'transient'; detail: string }
    /** Bad request, auth failure or rejected payload; retrying will not help. */
    | { status: 'rejected'; detail: string };

/**
 * Abstract outbound messaging channel.
 *
 * Known failure modes are returned as a {@link SendOutcome}; anything the
 * transport cannot categorize is thrown.
 */
export interface MessageTransport {
    send(text: string, format: FormatMode): Promise<SendOutcome>;
}
