import { v4 as uuidv4 } from 'uuid';

function pad(value: number, width: number = 2): string {
     return String(value).padStart(width, '0');
}

// YYYYMMDD in UTC
export function compactDate(date: Date): string {
     return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

// YYYYMMDDHHmmss in UTC
export function compactTimestamp(date: Date): string {
     return `${compactDate(date)}${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(
          date.getUTCSeconds()
     )}`;
}

export function orderNumberPrefix(date: Date): string {
     return `ORD-${compactDate(date)}-`;
}

/**
 * Next order number of the day given the highest one issued so far
 * (ORD-YYYYMMDD-NNNN).
 */
export function nextOrderNumber(date: Date, lastIssued: string | null): string {
     const prefix = orderNumberPrefix(date);
     let sequence = 1;
     if (lastIssued && lastIssued.startsWith(prefix)) {
          const previous = parseInt(lastIssued.slice(prefix.length), 10);
          if (!Number.isNaN(previous)) {
               sequence = previous + 1;
          }
     }
     return `${prefix}${pad(sequence, 4)}`;
}

export function shipmentNumber(orderNo: string, shippedAt: Date): string {
     return `SHIP-${orderNo}-${compactTimestamp(shippedAt)}`;
}

export function generateTrackingNumber(): string {
     return uuidv4();
}

// Eight upper-case hex characters, e.g. RMA-1A2B3C4D
export function shortReference(prefix: string): string {
     return `${prefix}-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}
