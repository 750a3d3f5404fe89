export * from "./store.js";
export * from "./sqliteStore.js";
