export * from "./reference.types";
export { parseDigestReference, formatDigestReference, isValidDigest } from "./reference";
