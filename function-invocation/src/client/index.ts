export { ChatClient } from "./client.js";
export type { ChatClientOptions } from "./client.js";
export type {
  ChatMiddleware,
  ChatRequest,
  NextFn,
  StreamNextFn,
} from "./middleware.js";
export {
  buildMiddlewareChain,
  buildStreamMiddlewareChain,
} from "./middleware.js";
