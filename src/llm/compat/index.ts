export { classifyProviderError, type LlmProviderErrorClass } from "./classify-error";
