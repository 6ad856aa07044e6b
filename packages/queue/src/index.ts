export { Channel } from "./channel.js";
export { Semaphore } from "./semaphore.js";
export { WorkerPool } from "./worker-pool.js";
export type { WorkerPoolOptions, WorkerPoolResult } from "./worker-pool.js";
