/** Outbound channels, one delivery attempt per channel per datasource. */
export type Channel = 'sms' | 'whatsapp' | 'voice';

/**
 * Outcome of a single channel send.
 *
 * Only the vendor SID is kept for successful sends; the message body
 * itself is not persisted.
 */
export type Delivery =
  | {
      readonly channel: Channel;
      readonly from: string;
      readonly to: string;
      readonly status: 'sent';
      readonly sid: string;
    }
  | {
      readonly channel: Channel;
      readonly from: string;
      readonly to: string;
      readonly status: 'failed';
      readonly error: string;
    };

/** Sender/recipient pair for one channel. */
export interface Route {
  readonly from: string;
  readonly to: string;
}
