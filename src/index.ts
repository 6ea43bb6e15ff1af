// src/index.ts
export * from './pieGeometry';
export * from './axisLimits';
export * from './sizeData';
export * from './validate';
export * from './palette';
export * from './chartConfig';
export * from './chartState';
export * from './bubblePieChart';
export * from './svgRenderer';
