export * from "./constants";
export * from "./schemas/functionPoints";
export * from "./schemas/testCases";
export * from "./schemas/understanding";
export * from "./schemas/tasks";
export * from "./taskRegistry";
export * from "./keyedLock";
export * from "./deepFreeze";
