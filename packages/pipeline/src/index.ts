export * from './aggregator';
export * from './alert-policy';
export * from './config';
export * from './decode';
export * from './detection-loop';
export * from './errors';
export * from './geometry';
export * from './models';
export * from './nms';
export * from './overlay-hold';
export * from './preprocess';
export * from './runtime/ort';
export * from './scheduler';
export * from './telemetry';
