export type * from './ocr.js';
export type * from './layout.js';
export type * from './config.js';
export type * from './output.js';
