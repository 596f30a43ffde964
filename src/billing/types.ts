/**
 * msgate — Billing Notification Contract
 */

/**
 * Notification read by the billing service. Field names are the
 * service's wire names.
 */
export interface BillingMessage {
  contact_urn: string;
  channel_uuid: string;
  message_id: string;
  /** RFC 3339 */
  message_date: string;
  channel_type: string;
  direction?: 'I' | 'O';
}

export type RoutingKey = 'create' | 'update';

/** Broker-like sink for billing notifications. */
export interface BillingPublisher {
  publish(message: BillingMessage, routingKey: RoutingKey): Promise<void>;
}
