/**
 * Role definitions index
 */

export { plannerRole } from './planner.js';
export { builderRole } from './builder.js';
export { qualityCheckerRole } from './quality-checker.js';
export { testerRole } from './tester.js';
export { documenterRole } from './documenter.js';
