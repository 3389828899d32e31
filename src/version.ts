export const NAME = "threadwatch";
export const VERSION = "1.0.0";
