/**
 * Configuración común de Jest: silencia los transportes de electron-log.
 */
import log from 'electron-log/node';

log.transports.file.level = false;
log.transports.console.level = false;
