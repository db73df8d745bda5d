export { putCommand, type PutOptions } from "./put";
