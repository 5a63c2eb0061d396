import { colors, withOpacity } from "../theme/colors";
import type { IconName } from "../theme/icons";

export type TradeSide = "buy" | "sell";

export type TradeButtonState = {
  disabled: boolean;
  demoMode: boolean;
};

export type TradeButtonAppearance = {
  label: "BUY" | "SELL";
  icon: IconName;
  fill: readonly [top: string, bottom: string];
  borderColor: string;
};

export const PRESSED_SCALE = 0.95;
export const PRESSED_OPACITY = 0.8;
export const PRESS_ANIMATION_MS = 100;

const sides = {
  buy: { label: "BUY", icon: "arrow.up.circle.fill", color: colors.buy },
  sell: { label: "SELL", icon: "arrow.down.circle.fill", color: colors.sell },
} as const;

export function tradeButtonAppearance(side: TradeSide, { disabled, demoMode }: TradeButtonState): TradeButtonAppearance {
  const { label, icon, color } = sides[side];
  const fill = disabled
    ? ([colors.neutral, colors.neutral] as const)
    : ([color, withOpacity(color, 0.8)] as const);
  return {
    label,
    icon,
    fill,
    borderColor: demoMode ? withOpacity(colors.demo, 0.5) : "transparent",
  };
}

export function pressedTransform(pressed: boolean) {
  return pressed
    ? { scale: PRESSED_SCALE, opacity: PRESSED_OPACITY }
    : { scale: 1, opacity: 1 };
}
