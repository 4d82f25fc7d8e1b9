export { InternalError } from "./internal-error.js";
export { NotFoundError } from "./not-found-error.js";
export { ValidationError } from "./validation-error.js";
