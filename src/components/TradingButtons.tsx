import { useRef } from "react";
import { Animated, Easing, Pressable, Text, View, StyleSheet } from "react-native";
import { Icon } from "./Icon";
import {
  PRESS_ANIMATION_MS,
  pressedTransform,
  tradeButtonAppearance,
} from "../lib/tradeButtons";
import type { TradeSide } from "../lib/tradeButtons";
import { type } from "../theme/typography";

type TradeButtonProps = {
  disabled: boolean;
  demoMode: boolean;
  onPress: () => void;
};

export function BuyButton(props: TradeButtonProps) {
  return <TradeButton side="buy" {...props} />;
}

export function SellButton(props: TradeButtonProps) {
  return <TradeButton side="sell" {...props} />;
}

// Scales and fades the wrapped content while a finger is down
function usePressAnimation() {
  const progress = useRef(new Animated.Value(0)).current;
  const rest = pressedTransform(false);
  const down = pressedTransform(true);

  const animateTo = (pressed: boolean) => {
    Animated.timing(progress, {
      toValue: pressed ? 1 : 0,
      duration: PRESS_ANIMATION_MS,
      easing: Easing.inOut(Easing.ease),
      useNativeDriver: false,
    }).start();
  };

  const style = {
    opacity: progress.interpolate({ inputRange: [0, 1], outputRange: [rest.opacity, down.opacity] }),
    transform: [{ scale: progress.interpolate({ inputRange: [0, 1], outputRange: [rest.scale, down.scale] }) }],
  };

  return { style, animateTo };
}

function TradeButton({ side, disabled, demoMode, onPress }: TradeButtonProps & { side: TradeSide }) {
  const look = tradeButtonAppearance(side, { disabled, demoMode });
  const { style: pressStyle, animateTo } = usePressAnimation();

  return (
    <Pressable
      testID={`trade-button-${side}`}
      accessibilityRole="button"
      accessibilityState={{ disabled }}
      accessibilityLabel={look.label}
      disabled={disabled}
      onPress={onPress}
      onPressIn={() => animateTo(true)}
      onPressOut={() => animateTo(false)}
      style={styles.pressable}
    >
      <Animated.View
        style={[styles.btn, { backgroundColor: look.fill[0], borderColor: look.borderColor }, pressStyle]}
      >
        <View style={[styles.fillShade, { backgroundColor: look.fill[1] }]} />
        <Icon name={look.icon} size={type.h2} color="#FFFFFF" />
        <Text style={styles.btnText}>{look.label}</Text>
      </Animated.View>
    </Pressable>
  );
}

const styles = StyleSheet.create({
  pressable: { flex: 1 },
  btn: {
    flexDirection: "row",
    alignItems: "center",
    justifyContent: "center",
    gap: 8,
    paddingVertical: 12,
    borderRadius: 10,
    borderWidth: 1,
    overflow: "hidden",
  },
  // lower half of the two-stop fill
  fillShade: {
    position: "absolute",
    left: 0,
    right: 0,
    bottom: 0,
    height: "50%",
  },
  btnText: {
    color: "#FFFFFF",
    fontSize: type.subheadline,
    fontWeight: "600",
  },
});
