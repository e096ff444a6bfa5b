export { ExclusionZoneBuilder } from './zone-builder';
export { GeodesicEngine } from './geodesic-engine';
export { generateCircle, circleBearings } from './circle-sampler';
export { verifyRing } from './ring-verifier';
export { ExporterRegistry } from './exporter-registry';
