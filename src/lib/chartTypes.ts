import type { IconName } from "../theme/icons";

export type ChartType = "candlestick" | "pnl" | "price" | "volume";

export type ChartTypeInfo = {
  title: string;
  description: string;
  icon: IconName;
};

export const chartTypes: Record<ChartType, ChartTypeInfo> = {
  candlestick: {
    title: "Candlestick Chart",
    description: "Shows open, high, low, close prices and volume for each time period",
    icon: "chart.bar",
  },
  pnl: {
    title: "P&L Chart",
    description: "Displays your profit and loss over time, showing account equity changes",
    icon: "dollarsign.circle",
  },
  price: {
    title: "Price Chart",
    description: "Shows price movement over time with trend visualization",
    icon: "chart.line.uptrend.xyaxis",
  },
  volume: {
    title: "Volume Chart",
    description: "Displays trading volume for each time period",
    icon: "chart.bar.fill",
  },
};

export const CHART_TYPES: readonly ChartType[] = ["candlestick", "pnl", "price", "volume"];
