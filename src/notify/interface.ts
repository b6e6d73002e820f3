export type NotificationUrgency = 'low' | 'normal' | 'critical';

/**
 * Desktop notification mechanism. `notify` never blocks and never throws:
 * notifications are advisory.
 */
export interface Notifier {
  readonly name: string;
  notify(title: string, message: string, urgency?: NotificationUrgency): void;
}
