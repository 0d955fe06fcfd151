export { DebugView } from "./DebugView";
export { InputManager } from "./InputManager";
export { SourceController } from "./SourceController";
