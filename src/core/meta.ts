export const TOOL_NAME = 'runsheet';
export const TOOL_VERSION = '1.0.0';
