export { createRouter } from "./router.js";
export type { Route, Router, DispatchOptions } from "./router.js";
