import { useState } from "react";
import { ScrollView, Text, View, Pressable, StyleSheet } from "react-native";
import { BuyButton, SellButton } from "../components/TradingButtons";
import { LoadingState } from "../components/LoadingState";
import { config } from "../config";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { type } from "../theme/typography";

export function TradingButtonsScreen() {
  const [demoMode, setDemoMode] = useState(config.demoMode);
  const [lastAction, setLastAction] = useState<string | null>(null);

  return (
    <ScrollView contentContainerStyle={styles.scrollContent}>
      <Text style={styles.h1}>Trading Buttons</Text>
      <Pressable
        accessibilityRole="switch"
        accessibilityState={{ checked: demoMode }}
        onPress={() => setDemoMode((v) => !v)}
        style={[styles.toggle, demoMode && styles.toggleOn]}
      >
        <Text style={[styles.toggleText, demoMode && styles.toggleTextOn]}>
          Demo mode: {demoMode ? "On" : "Off"}
        </Text>
      </Pressable>

      <Text style={styles.section}>Enabled</Text>
      <View style={styles.row}>
        <BuyButton disabled={false} demoMode={demoMode} onPress={() => setLastAction("BUY pressed")} />
        <SellButton disabled={false} demoMode={demoMode} onPress={() => setLastAction("SELL pressed")} />
      </View>

      <Text style={styles.section}>Disabled</Text>
      <View style={styles.row}>
        <BuyButton disabled demoMode={demoMode} onPress={() => setLastAction("BUY pressed")} />
        <SellButton disabled demoMode={demoMode} onPress={() => setLastAction("SELL pressed")} />
      </View>

      <LoadingState message="Submitting order..." />
      {lastAction ? <Text style={styles.hint}>{lastAction}</Text> : null}
    </ScrollView>
  );
}

const styles = StyleSheet.create({
  scrollContent: {
    paddingBottom: 120,
    gap: spacing.md,
    paddingHorizontal: spacing.md,
    paddingTop: spacing.lg,
  },
  h1: {
    color: colors.textPrimary,
    fontSize: type.h1,
    fontWeight: "700",
    letterSpacing: 0.2,
  },
  section: {
    color: colors.textMuted,
    fontSize: type.caption,
    fontWeight: "700",
    textTransform: "uppercase",
  },
  row: { flexDirection: "row", gap: 12 },
  toggle: {
    alignSelf: "flex-start",
    paddingHorizontal: 12,
    paddingVertical: 6,
    borderRadius: 999,
    borderWidth: 1,
    borderColor: colors.surfaceBorderStrong,
  },
  toggleOn: { borderColor: colors.demo, backgroundColor: colors.demo + "15" },
  toggleText: { color: colors.textSecondary, fontWeight: "600" },
  toggleTextOn: { color: colors.demo },
  hint: { color: colors.textMuted, fontSize: type.body },
});
