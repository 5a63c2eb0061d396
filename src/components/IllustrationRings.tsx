import { View, StyleSheet } from "react-native";
import type { ReactNode } from "react";
import { colors } from "../theme/colors";

// Concentric rings drawn behind an empty-state glyph
export function IllustrationRings({ children }: { children: ReactNode }) {
  return (
    <View style={styles.wrap}>
      <View style={[styles.ring, { borderColor: colors.accent }]} />
      <View style={[styles.ringSmall, { borderColor: colors.ringMint }]} />
      <View style={[styles.ringTiny, { borderColor: colors.ringAmber }]} />
      {children}
    </View>
  );
}

const styles = StyleSheet.create({
  wrap: {
    alignItems: "center",
    justifyContent: "center",
    width: 120,
    height: 120,
  },
  ring: {
    position: "absolute",
    width: 120,
    height: 120,
    borderRadius: 60,
    borderWidth: 2,
    opacity: 0.25,
  },
  ringSmall: {
    position: "absolute",
    width: 96,
    height: 96,
    borderRadius: 48,
    borderWidth: 2,
    opacity: 0.35,
  },
  ringTiny: {
    position: "absolute",
    width: 72,
    height: 72,
    borderRadius: 36,
    borderWidth: 2,
    opacity: 0.45,
  },
});
