export * from "./random"
