export * from "./clock";
export * from "./contract";
export * from "./fixtures";
