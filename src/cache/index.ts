export { MemoizingFetchCache } from "./memoizingFetchCache";
export type { FetchFn, CacheGetOptions } from "./memoizingFetchCache";
