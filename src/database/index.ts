export { getPool, closePool, testConnection, isMockMode } from './connection';
