export const CLI_NAME = "folder-mirror";

export const DEFAULT_INTERVAL_SECONDS = 60;

export const LOG_LEVEL_ENV = "FOLDER_MIRROR_LOG_LEVEL";
