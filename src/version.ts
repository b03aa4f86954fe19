export const SERVICE_NAME = "Digital Wellness Assistant";
export const SERVICE_VERSION = "1.0.0";
