/**
 * Error Module
 *
 * Exports the four notifier error kinds and the `describeError` log helper.
 */
export * from "./notifier-errors";
