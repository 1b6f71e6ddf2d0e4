export * from "./positionTracker";
