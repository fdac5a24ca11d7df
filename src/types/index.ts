export * from "./application"
export * from "./bindings"
export * from "./collections"
export * from "./settings"
export * from "./sync"
export * from "./tree"
