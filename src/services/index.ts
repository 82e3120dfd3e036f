/**
 * Services module - re-export all service modules
 */

export * from "./job-scheduler";
export * from "./dispatcher";
