export { conformationFromVectors, vectorsFromBuffer } from "./coordinates.js";
export { makeGradientLines, type GradientLineOptions } from "./gradientLines.js";
