export { MouseTracking, disableMouse, mouseTrackingSequence, tracksMouse } from './mouseTracking';
export { parseMouseEvent } from './parseMouseEvent';
export { MouseProvider } from './MouseProvider';
