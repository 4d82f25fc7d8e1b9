export const PACKAGE_NAME = "@tagwarden/test-utils" as const;

export { createTestElement, TestElement, type TestElementInit } from "./element.js";
