export * from "./securityPolicy";
export * from "./rules";
export * from "./evaluator";
export * from "./policySource";
