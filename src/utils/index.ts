export {
  roundCoordinate,
  roundPoint,
  formatCoordinate,
  formatCenterLabel,
  buildOutputName,
} from './format';

export { writeFileAtomic, removeFile, PARTIAL_SUFFIX } from './file';
