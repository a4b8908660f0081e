// Main entry point for @res-fusion/core

// Export config
export * from './config';

// Export error kinds
export * from './errors';

// Export utilities
export * from './utils';

// Export site definition
export * from './site';

// Export nearest station resolution
export * from './geo';

// Export weather archive loading
export * from './weather';

// Export alignment
export * from './alignment';

// Export fusion
export * from './fusion';

// Export file loaders
export * from './io';

// Export site pipeline
export * from './pipeline';
