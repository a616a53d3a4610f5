export * from "./constants";
export * from "./errors";
export * from "./utils";
export * from "./tubeSize";
export * from "./boundCurve";
export * from "./loopResolver";
export * from "./interp";
export * from "./compare";
export * from "./pipeline";
export * from "./summary";
