export const TOOL_VERSION = '0.1.0';

export const computeToolVersion = (): string => TOOL_VERSION;
