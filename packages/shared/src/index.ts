export * from "./env";
export * from "./schemas";
export * from "./types/market";
export * from "./types/winrate";
export * from "./utils/sessionTime";
export * from "./utils/time";
