export * from './resume.interfaces';
export * from './scoring.interfaces';
export * from './config.interfaces';
export * from './analysis.interfaces';
