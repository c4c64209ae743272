export * from "./models/common";
export * from "./models/forecast";
export * from "./api/types";
export * from "./api/endpoints";
