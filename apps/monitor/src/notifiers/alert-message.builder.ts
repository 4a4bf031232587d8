import { AlertContent } from '../interfaces/alert.interface';
import { PriceSourceId, SOURCE_LABELS } from '../interfaces/price-reading.interface';

export interface AlertMessage {
  subject: string;
  text: string;
}

/**
 * `YYYY-MM-DD HH:mm:ss` in UTC
 */
export function formatAlertTime(timestamp: number): string {
  return new Date(timestamp).toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Plain-text alert with both prices, the discrepancy, the threshold and the
 * observation time
 */
export function buildAlertMessage(content: AlertContent): AlertMessage {
  const { symbol, priceA, priceB, discrepancyPercent, threshold, timestamp } = content;
  const diff = discrepancyPercent.toFixed(2);

  const text = [
    `Price Discrepancy Alert for ${symbol}:`,
    '',
    `${SOURCE_LABELS[PriceSourceId.ALPHA_VANTAGE]} Price: $${priceA.toFixed(2)}`,
    `${SOURCE_LABELS[PriceSourceId.YAHOO_FINANCE]} Price: $${priceB.toFixed(2)}`,
    `Price Difference: ${diff}%`,
    '',
    `This difference exceeds the configured threshold of ${threshold}%.`,
    '',
    `Time: ${formatAlertTime(timestamp)} UTC`,
    '',
    'Alert Analysis:',
    `- Threshold: ${threshold}%`,
    `- Current Discrepancy: ${diff}%`,
    `- Percentage Above Threshold: ${(discrepancyPercent - threshold).toFixed(2)}%`,
  ].join('\n');

  return {
    subject: `Price Discrepancy Alert - ${symbol}`,
    text,
  };
}
