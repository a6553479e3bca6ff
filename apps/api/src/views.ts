/**
 * Response shapes for links and notifications
 */

import { formatShortUrl, type LinkRecord, type Notification } from "@shortbox/shared";

export interface LinkView {
  slug: string;
  shortUrl: string;
  targetUrl: string;
  ownerId: string;
  /** null when unlimited */
  maxClicks: number | null;
  /** null when unlimited */
  remainingClicks: number | null;
  createdAt: string;
  expiresAt: string;
}

export interface LinkSummaryView extends LinkView {
  /** Past its expiry but not swept yet */
  expired: boolean;
}

export interface NotificationView {
  timestamp: string;
  message: string;
}

export function toLinkView(link: LinkRecord): LinkView {
  return {
    slug: link.slug,
    shortUrl: formatShortUrl(link.slug),
    targetUrl: link.targetUrl,
    ownerId: link.ownerId,
    maxClicks: link.clicks.kind === "limited" ? link.clicks.max : null,
    remainingClicks: link.clicks.kind === "limited" ? link.clicks.remaining : null,
    createdAt: link.createdAt.toISOString(),
    expiresAt: link.expiresAt.toISOString(),
  };
}

export function toNotificationView(notification: Notification): NotificationView {
  return {
    timestamp: notification.timestamp.toISOString(),
    message: notification.message,
  };
}
