export const EOL = '\n';
export const DOUBLE_EOL = EOL + EOL;
export const INDENT = ' '.repeat(4);

/** Name the lifecycle manager publishes and logs under */
export const LIFECYCLE_MANAGER_SOURCE = 'lifecycle-manager';

/** Name the message bus logs under */
export const MESSAGE_BUS_SOURCE = 'message-bus';
