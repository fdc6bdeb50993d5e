/**
 * Position Types
 *
 * A position is one depositor's share of the pool. It exists only while
 * at least one of its balances is non-zero.
 */

/**
 * Live position held by the ledger.
 */
export interface Position {
  readonly depositor: string;

  /** Primary asset balance in smallest units */
  readonly primaryBalance: bigint;

  /** Secondary asset balance in smallest units */
  readonly secondaryBalance: bigint;

  /**
   * Value in primary units recorded when the position was opened.
   * Profit baseline for the performance fee; never changes afterwards.
   */
  readonly entryValue: bigint;
}

/**
 * Serializable form of a Position (bigint fields as decimal strings).
 */
export interface PositionRecord {
  readonly depositor: string;
  readonly primaryBalance: string;
  readonly secondaryBalance: string;
  readonly entryValue: string;
}
