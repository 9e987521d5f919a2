export type Topic = 'order' | 'inventory' | 'notification';

/** An advisory server-side filter registered by calling code. */
export interface Subscription {
  topic: Topic;
  /** Order id, location id or user id, depending on the topic. */
  key: string;
}

export interface SubscriptionControlMessage {
  type: 'subscribe' | 'unsubscribe';
  channel: string;
  [keyField: string]: string;
}
