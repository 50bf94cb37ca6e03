export { Interp } from "./interp";
