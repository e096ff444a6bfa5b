export { toRadians, toDegrees, normalizeBearing, dmsToDecimal, dmsPairToPoint } from './angles';

export { WGS84, semiMinorAxis } from './ellipsoid';

export { vincentyDirect, vincentyInverse } from './vincenty';

export { getBoundingBox } from './bounds';
