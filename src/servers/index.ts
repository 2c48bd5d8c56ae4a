export { confluenceServerConfig, startConfluenceToolServer } from './confluenceServer.js';
export { createHttpApp } from './httpServer.js';
export { jiraServerConfig, startJiraToolServer } from './jiraServer.js';
export { buildMcpServer } from './mcpServerFactory.js';
export { startToolServer, type ToolServerHandle } from './toolServer.js';
