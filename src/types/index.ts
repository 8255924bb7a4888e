export * from "./analysis";
export * from "./marketData";
export * from "./portfolio";
