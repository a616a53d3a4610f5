export * from "./csv";
export * from "./writer";
export * from "./compareAndReport";
