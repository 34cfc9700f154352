export * from './typed-variables';
export * from './typed-expressions';
export * from './typed-statements';
export * from './typed-toplevel';
export * from './typed-serialization';
