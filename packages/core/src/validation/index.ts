export { validateConstraints } from "./constraints.js";
