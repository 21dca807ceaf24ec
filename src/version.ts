export const TOOL_NAME = 'spdx-lint';
export const TOOL_VERSION = '0.1.0';
