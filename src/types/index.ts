export * from "./customer";
export * from "./order";
export * from "./pagination";
export * from "./product";
export * from "./statistics";
export * from "./supplier";
