export { VisibilityScene } from "./VisibilityScene";
