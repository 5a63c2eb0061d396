import type { ColorValue } from "../theme/colors";
import { fixed, formatDateTime, formatTime, formatVolume, signed } from "./format";

export type Candle = {
  openTime: Date | number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type TooltipValue = {
  label: string;
  value: string;
  color?: ColorValue;
};

export type TooltipData = {
  title: string;
  values: TooltipValue[];
};

const trendColor = (delta: number): ColorValue => (delta >= 0 ? "green" : "red");

export function candlestickTooltip(candle: Candle): TooltipData {
  return {
    title: "Candlestick Data",
    values: [
      { label: "Open", value: fixed(candle.open) },
      { label: "High", value: fixed(candle.high) },
      { label: "Low", value: fixed(candle.low) },
      { label: "Close", value: fixed(candle.close), color: trendColor(candle.close - candle.open) },
      { label: "Volume", value: formatVolume(candle.volume) },
    ],
  };
}

export function pnlTooltip(equity: number, timestamp: Date | number, change: number): TooltipData {
  const pct = equity !== 0 ? (change / equity) * 100 : NaN;
  return {
    title: "P&L Data",
    values: [
      { label: "Time", value: formatDateTime(timestamp) },
      { label: "Equity", value: fixed(equity) },
      { label: "Change", value: signed(change), color: trendColor(change) },
      { label: "% Change", value: Number.isFinite(pct) ? `${signed(pct, 1)}%` : "—", color: trendColor(change) },
    ],
  };
}

export function priceTooltip(price: number, timestamp: Date | number, change?: number): TooltipData {
  const values: TooltipValue[] = [
    { label: "Time", value: formatTime(timestamp) },
    { label: "Price", value: fixed(price) },
  ];
  if (change != null) {
    values.push({ label: "Change", value: signed(change), color: trendColor(change) });
  }
  return { title: "Price Data", values };
}
