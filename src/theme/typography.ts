import { Dimensions } from "react-native";

const { width } = Dimensions.get("window");
// Responsive tiers
const isTiny = width <= 360; // very narrow phones
const isSmall = !isTiny && width <= 412; // small phones

export const type = {
  h1: isTiny ? 20 : isSmall ? 22 : 26,
  h2: isTiny ? 16 : isSmall ? 18 : 20,
  headline: isTiny ? 15 : isSmall ? 16 : 17,
  subheadline: isTiny ? 13 : isSmall ? 14 : 15,
  body: isTiny ? 12 : isSmall ? 13 : 14,
  caption: isTiny ? 11 : 12,
  caption2: isTiny ? 10 : 11,
};

// Glyph sizes for icon tokens
export const iconSize = {
  dot: 8,
  legend: 10,
  inline: 14,
  tab: 24,
  grid: 32,
  hero: 48,
};
