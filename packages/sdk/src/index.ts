export * from "./ids";
export * from "./model";
export * from "./errors";
export * from "./logger";
export * from "./config";
export * from "./store";
export * from "./fileStore";
export * from "./positions";
export * from "./access";
export * from "./state";
export * from "./commands";
export * from "./search";
export * from "./resolver";
export * from "./actions";
export * from "./parser";
export * from "./executor";
export * from "./llm";
export * from "./prompts";
export * from "./chat";
