export * from './types';
export * from './engine/Interval';
export * from './engine/IntervalIndex';
export * from './engine/CategoryMap';
export * from './engine/Pipeline';
export * from './parser/AlmanacParser';
export * from './defaults';
export * from './errors';
