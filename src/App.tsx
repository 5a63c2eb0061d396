import { View, StatusBar, StyleSheet } from "react-native";
import RootNavigator from "./navigation/RootNavigator";
import { colors } from "./theme/colors";

export default function App() {
  return (
    <View style={styles.container}>
      <StatusBar barStyle="dark-content" />
      <RootNavigator />
    </View>
  );
}

const styles = StyleSheet.create({
  container: { flex: 1, height: "100%", backgroundColor: colors.background },
});
