// Response simulation module exports

export * from "./types";
export * from "./builtinRules";
export * from "./ruleEngine";
export * from "./rulesLoader";
