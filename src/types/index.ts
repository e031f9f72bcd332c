/**
 * Version-independent Slurm domain model.
 */

export * from './common.js';
export * from './job.js';
export * from './node.js';
export * from './partition.js';
export * from './reservation.js';
export * from './accounting.js';
