export * from "./constants";
export * from "./schemas/repoIndex";
export * from "./schemas/pass2";
export * from "./schemas/siblings";
