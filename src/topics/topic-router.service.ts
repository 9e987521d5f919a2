import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { Observable, Subject } from 'rxjs';
import { RealtimeChannelService } from '../realtime/realtime-channel.service';
import { ConnectionStatusEvent, REALTIME_EVENTS, ServerMessage } from '../realtime/realtime.types';
import { Subscription, SubscriptionControlMessage, Topic } from './topics.types';

/** Wire channel name and identifying field per topic. */
const TOPIC_WIRE: Record<Topic, { channel: string; keyField: string }> = {
  order: { channel: 'order', keyField: 'id' },
  inventory: { channel: 'inventory', keyField: 'location_id' },
  notification: { channel: 'notifications', keyField: 'user_id' },
};

/**
 * Fans inbound real-time frames out to one broadcast stream per topic.
 *
 * Frames are routed by their `type` only. Subscriptions are sent to the
 * server as filters and remembered so they can be replayed after every
 * reconnect, but they never gate local delivery: every `order_update` reaches
 * every `orderUpdates$` subscriber, whichever order it concerns.
 */
@Injectable()
export class TopicRouterService implements OnModuleDestroy {
  private readonly logger = new Logger(TopicRouterService.name);

  private readonly orderSubject = new Subject<unknown>();
  private readonly inventorySubject = new Subject<unknown>();
  private readonly notificationSubject = new Subject<unknown>();
  private readonly statusSubject = new Subject<ConnectionStatusEvent>();

  /** message type → destination */
  private readonly routes = new Map<string, Subject<unknown>>([
    ['order_update', this.orderSubject],
    ['inventory_update', this.inventorySubject],
    ['notification', this.notificationSubject],
  ]);

  /** `${topic}:${key}` → subscription */
  private readonly active = new Map<string, Subscription>();

  readonly orderUpdates$: Observable<unknown> = this.orderSubject.asObservable();
  readonly inventoryUpdates$: Observable<unknown> = this.inventorySubject.asObservable();
  readonly notifications$: Observable<unknown> = this.notificationSubject.asObservable();
  readonly connectionStatus$: Observable<ConnectionStatusEvent> = this.statusSubject.asObservable();

  constructor(private readonly channel: RealtimeChannelService) {}

  onModuleDestroy() {
    this.orderSubject.complete();
    this.inventorySubject.complete();
    this.notificationSubject.complete();
    this.statusSubject.complete();
  }

  /**
   * Ask the server for updates about one entity. The request is remembered
   * and re-sent after every reconnect; while the channel is down it is only
   * remembered.
   */
  subscribe(topic: Topic, key: string) {
    this.active.set(subscriptionId(topic, key), { topic, key });
    this.channel.sendMessage(controlMessage('subscribe', topic, key));
  }

  /** @returns `true` if the subscription was known locally. */
  unsubscribe(topic: Topic, key: string): boolean {
    const known = this.active.delete(subscriptionId(topic, key));
    this.channel.sendMessage(controlMessage('unsubscribe', topic, key));
    return known;
  }

  subscribeToOrder(orderId: string) {
    this.subscribe('order', orderId);
  }

  unsubscribeFromOrder(orderId: string): boolean {
    return this.unsubscribe('order', orderId);
  }

  subscribeToInventory(locationId: string) {
    this.subscribe('inventory', locationId);
  }

  unsubscribeFromInventory(locationId: string): boolean {
    return this.unsubscribe('inventory', locationId);
  }

  subscribeToNotifications(userId: string) {
    this.subscribe('notification', userId);
  }

  unsubscribeFromNotifications(userId: string): boolean {
    return this.unsubscribe('notification', userId);
  }

  get subscriptions(): Subscription[] {
    return [...this.active.values()];
  }

  /** Route a decoded frame to its topic stream; unknown types are dropped. */
  @OnEvent(REALTIME_EVENTS.message)
  handleMessage(msg: ServerMessage) {
    const destination = this.routes.get(msg.type);
    if (!destination) {
      this.logger.debug(`Dropped real-time frame of unknown type "${msg.type}"`);
      return;
    }
    destination.next(msg.data);
  }

  @OnEvent(REALTIME_EVENTS.status)
  handleStatus(event: ConnectionStatusEvent) {
    this.statusSubject.next(event);
  }

  /** Replay every remembered subscription on the fresh connection. */
  @OnEvent(REALTIME_EVENTS.connected)
  handleConnected() {
    if (this.active.size === 0) return;
    this.logger.log(`Re-subscribing ${this.active.size} subscription(s) after connect…`);
    for (const { topic, key } of this.active.values()) {
      this.channel.sendMessage(controlMessage('subscribe', topic, key));
    }
  }
}

function subscriptionId(topic: Topic, key: string): string {
  return `${topic}:${key}`;
}

function controlMessage(
  type: SubscriptionControlMessage['type'],
  topic: Topic,
  key: string,
): SubscriptionControlMessage {
  const { channel, keyField } = TOPIC_WIRE[topic];
  return { type, channel, [keyField]: key };
}
