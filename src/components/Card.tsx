import { View, Platform, StyleSheet } from "react-native";
import type { StyleProp, ViewProps, ViewStyle } from "react-native";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";

type CardVariant = "default" | "muted";
type CardSize = "regular" | "compact";

type Props = ViewProps & {
  variant?: CardVariant;
  size?: CardSize;
  noPadding?: boolean;
};

export default function Card({ style, variant = "default", size = "regular", noPadding, ...rest }: Props) {
  const base: StyleProp<ViewStyle>[] = [styles.cardBase, size === "compact" ? styles.cardCompact : styles.cardRegular];
  if (variant === "muted") base.push(styles.cardMuted);
  else base.push(styles.cardDefault);
  if (!noPadding) base.push(size === "compact" ? styles.paddingCompact : styles.paddingRegular);
  return <View {...rest} style={[...base, style]} />;
}

const styles = StyleSheet.create({
  cardBase: {
    borderWidth: 1,
    ...(Platform.OS !== "web"
      ? {
          shadowColor: "#000",
          shadowOpacity: 0.1,
          shadowRadius: 4,
          shadowOffset: { width: 0, height: 2 },
        }
      : {}),
  },
  cardRegular: { borderRadius: 8 },
  cardCompact: { borderRadius: 6 },
  paddingRegular: {
    paddingHorizontal: 12,
    paddingVertical: spacing.sm,
  },
  paddingCompact: {
    paddingHorizontal: spacing.sm,
    paddingVertical: spacing.xs,
  },
  cardDefault: {
    backgroundColor: colors.surface,
    borderColor: colors.surfaceBorder,
  },
  cardMuted: {
    backgroundColor: colors.surfaceMuted,
    borderColor: "transparent",
  },
});
