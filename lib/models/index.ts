export * from "./beer";
export * from "./preference";
export * from "./session";
