/**
 * Order summary relayed to Telegram.
 *
 * Built from a single MoySklad customer order response and discarded once the
 * message is sent. Optional fields are `undefined` when MoySklad has no value;
 * display placeholders are applied by the message renderer.
 */
export interface OrderNotification {
  /** Human-facing order number (`name` in MoySklad) */
  readonly number: string;
  /** Creation timestamp as sent by MoySklad, e.g. `2024-09-24 12:00:00.000` */
  readonly moment: string;
  readonly counterpartyName?: string;
  /** Order total in kopecks */
  readonly sum: number;
  readonly stateName?: string;
  readonly comment?: string;
  /** API URL of the order */
  readonly href: string;
}
