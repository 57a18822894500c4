import { Server } from 'http'
import { Express } from 'express'

/**
 * Starts listening and settles once the port is bound, rejecting on bind
 * errors such as EADDRINUSE instead of leaving them unhandled.
 */
export function listen(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host)
    const onError = (error: Error) => reject(error)
    server.once('error', onError)
    server.once('listening', () => {
      server.off('error', onError)
      resolve(server)
    })
  })
}
