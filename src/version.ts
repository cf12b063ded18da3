/**
 * Server identity, shared by the MCP handshake, the HTTP transport and
 * the outbound User-Agent.
 */

export const SERVER_NAME = 'porkbun-domain-mcp';
export const SERVER_VERSION = '0.1.0';
