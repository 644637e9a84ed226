export { RasterizationEngine } from './rasterization.engine.js';
export {
    TransformEngine,
    TRANSFORM_STEPS,
    computeDownscaleSize,
    type TransformContext,
    type TransformStep,
} from './transform.engine.js';
export { OutputEngine, buildEncodeSpec } from './output.engine.js';
