export * from './core';
export * from './capture';
export * from './collector';
export * from './aggregator';
export * from './reporter';
export * from './replay';
