export * from "./defaults";
export * from "./layout";
