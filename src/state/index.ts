export * from "./application"
export * from "./collections"
export * from "./settings"
export * from "./sync"
