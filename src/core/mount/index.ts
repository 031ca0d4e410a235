export { defaultMountPoint, isUnderMount, relativeSegments, resolveMountPoint } from './resolver.js';
