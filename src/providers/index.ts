/**
 * Provider module exports
 */

export * from "./provider.interface";
export * from "./retry";
export * from "./openai-provider";
export * from "./anthropic-provider";
export * from "./provider-factory";
