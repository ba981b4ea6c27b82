export * from "./constants";
export * from "./errors";
export * from "./measure";
export * from "./payoff";
export * from "./binomial";
export * from "./scenarios";
export * from "./guards";
export * from "./vanilla";
export * from "./barrier";
export * from "./paths";
