export * from "./types/geometry.js";
export { bondLengthLoss } from "./losses/bondLength.js";
export { bondAngleLoss } from "./losses/bondAngle.js";
export { ringPlanarityLoss, ringSetPlanarityLoss, gatherRings, scatterRingGradient } from "./losses/ringPlanarity.js";
export { stericClashLoss, DEFAULT_CLASH_THRESHOLD, type StericClashOptions } from "./losses/stericClash.js";
export { chiralityLoss, signedVolume } from "./losses/chirality.js";
export { totalLoss, resolveWeights, DEFAULT_WEIGHTS, type TotalLossInput, type TotalLossOptions } from "./losses/total.js";
export { WarningCollector, MAX_WARNINGS } from "./utils/warnings.js";
export { GeometryInputError, type GeometryInputErrorKind } from "./utils/errors.js";
export { symmetricEigen3, type SymmetricEigen3 } from "./utils/eigen.js";
export { checkGradient, type GradientCheckOptions, type GradientCheckResult } from "./utils/gradcheck.js";
export { EPS_NORM, EPS_COS, EPS_GAP, pairwiseDistances, safeNormalize, bondedPairMask } from "./utils/numeric.js";
export { conformationFromPoints, bondTopology, angleTopology, ringSet, chiralCenters } from "./utils/topology.js";
export * from "./adapters/three/index.js";
