export * from "./backpressure";
export * from "./cappedCounter";
export * from "./fetchEngine";
export * from "./keys";
export * from "./shardDownloader";
export * from "./workerPool";
