export * from "./errors/cua.errors";
export * from "./types/messageContent.types";
export * from "./types/desktop.types";
export * from "./utils/messageContent.utils";
export * from "./utils/elementQuery.utils";
export * from "./utils/delay";
export * from "./utils/platform";
