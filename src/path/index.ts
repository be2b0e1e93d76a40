export { PathBuilder, type SubPath } from "./PathBuilder";
