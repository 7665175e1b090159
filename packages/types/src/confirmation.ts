/**
 * Confirmation Types
 *
 * Observations from the upstream transfer feed. The reconciler only
 * reads these; it never creates them.
 */

/**
 * External confirmation reference. Unique per event: on EVM chains it
 * is `<transactionHash>:<logIndex>`, since one transaction can emit
 * several Transfer logs.
 */
export type ExternalRef = string;

/**
 * Position of an event in the upstream feed.
 * Ordering is (blockNumber, logIndex) ascending.
 */
export interface CursorPosition {
  readonly blockNumber: number;
  readonly logIndex: number;
}

/**
 * A single transfer-style confirmation event.
 */
export interface ConfirmationEvent {
  /** Reference binding this event to exactly one stored record */
  readonly externalRef: ExternalRef;

  /**
   * Transaction that emitted the event, when the feed has one. A marker
   * expecting this ref is confirmed by the first event of the transaction.
   */
  readonly transactionRef?: string;

  /** Sending party */
  readonly fromParty: string;

  /** Receiving party */
  readonly toParty: string;

  /** Transferred value in base units, as a decimal string */
  readonly value: string;

  /** Where this event sits in the feed */
  readonly cursorPosition: CursorPosition;
}
