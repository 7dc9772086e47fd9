export const APP_NAME = "pdfdex";
export const APP_VERSION = "0.1.0";
