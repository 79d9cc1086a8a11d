export type { GraphLoader } from "./GraphLoader.js";
