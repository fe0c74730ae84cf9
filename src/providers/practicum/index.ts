export { buildPracticumUrl, createPracticumClient } from "./client.js";
export type { FetchLike, PracticumClientOptions } from "./client.js";
