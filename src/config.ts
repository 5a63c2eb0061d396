const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function parseFlag(raw: string | undefined) {
  return raw != null && TRUTHY.has(raw.trim().toLowerCase());
}

export const config = {
  // VITE_DEMO_MODE=1 starts the trading preview with the demo-mode outline on
  demoMode: parseFlag(import.meta.env.VITE_DEMO_MODE),
};
