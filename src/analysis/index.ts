export * from './types';
export * from './errors';
export * from './run-config';
export * from './normalizer';
export * from './engagement-scorer';
export * from './post-ranker';
export * from './hook-extractor';
export * from './timing-analyzer';
export * from './hashtag-analyzer';
export * from './topic-extractor';
export * from './caption-analyzer';
export * from './competitor-summary';
export * from './aggregator';
export * from './insight-formatter';
export * from './report-builder';
export * from './engine';
