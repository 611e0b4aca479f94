export const SEGMENT_SEPARATOR: string = " ";
export const LINE_SEPARATOR: string = "\r\n";
export const DATA_END: string = ".";
export const DEFAULT_DOMAIN: string = "localhost";
export const DEFAULT_HOSTNAME: string = "localhost";
export const DEFAULT_PORT: number = 1025;
