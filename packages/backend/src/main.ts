// Server entry point
import { loadConfig } from './config.js'
import { startServer } from './server.js'

async function main() {
  try {
    const config = loadConfig()
    const server = await startServer(config)
    server.log.info(`Backend server listening on http://${config.host}:${config.port}`)
  } catch (err) {
    console.error('Failed to start server:', err)
    process.exit(1)
  }
}

void main()
