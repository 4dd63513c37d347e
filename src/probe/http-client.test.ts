import { describe, it, expect, beforeAll, afterAll, beforeEach, jest } from '@jest/globals'
import { createServer, IncomingMessage, Server, ServerResponse } from 'node:http'
import { createHttpClient } from './http-client'
import { Probe } from './probe'
import { statusOutcome, errorOutcome } from '../core/types/outcome'

type Route = (req: IncomingMessage, res: ServerResponse) => void

const listen = (server: Server) =>
  new Promise<string>((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('Test server has no TCP address'))
        return
      }
      resolve(`http://127.0.0.1:${address.port}`)
    })
  })

const close = (server: Server) =>
  new Promise<void>((resolve) => {
    server.closeAllConnections()
    server.close(() => resolve())
  })

describe('createHttpClient against a live server', () => {
  let server: Server
  let baseUrl: string
  let requests: string[]
  let userAgents: (string | undefined)[]
  let onStreamClosed: () => void = () => undefined

  const routes: Record<string, Route> = {
    '/ok.png': (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'image/png' }).end()
    },
    '/no-head.png': (req, res) => {
      res.writeHead(req.method === 'HEAD' ? 405 : 404).end()
    },
    '/moved.png': (_req, res) => {
      res.writeHead(302, { Location: '/gone.png' }).end()
    },
    '/gone.png': (_req, res) => {
      res.writeHead(404).end()
    },
    '/broken.png': (_req, res) => {
      res.writeHead(500).end()
    },
    '/endless.png': (req, res) => {
      if (req.method === 'HEAD') {
        res.writeHead(403).end()
        return
      }
      res.writeHead(200, { 'Content-Type': 'image/png' })
      const timer = setInterval(() => res.write(Buffer.alloc(1024)), 5)
      res.on('close', () => {
        clearInterval(timer)
        onStreamClosed()
      })
    },
    '/slow.png': (_req, res) => {
      const timer = setTimeout(() => res.writeHead(200).end(), 1000)
      res.on('close', () => clearTimeout(timer))
    },
  }

  beforeAll(async () => {
    server = createServer((req, res) => {
      const path = req.url ?? '/'
      requests.push(`${req.method} ${path}`)
      userAgents.push(req.headers['user-agent'])
      const route = routes[path]
      if (route) {
        route(req, res)
      } else {
        res.writeHead(404).end()
      }
    })
    baseUrl = await listen(server)
  })

  afterAll(async () => {
    await close(server)
  })

  beforeEach(() => {
    requests = []
    userAgents = []
  })

  it('should resolve error statuses instead of throwing', async () => {
    const client = createHttpClient()

    await expect(client.head(`${baseUrl}/broken.png`)).resolves.toMatchObject({ status: 500 })
    await expect(client.get(`${baseUrl}/gone.png`)).resolves.toMatchObject({ status: 404 })
  })

  it('should send the configured user agent', async () => {
    await createHttpClient({ userAgent: 'imgaudit-test' }).head(`${baseUrl}/ok.png`)

    expect(userAgents).toEqual(['imgaudit-test'])
  })

  describe('through Probe', () => {
    let probe: Probe

    beforeEach(() => {
      probe = new Probe({ retries: 0, timeoutMs: 2000 })
    })

    it('should report a reachable image from HEAD alone', async () => {
      await expect(probe.check(`${baseUrl}/ok.png`)).resolves.toEqual(statusOutcome(200))
      expect(requests).toEqual(['HEAD /ok.png'])
    })

    it('should fall back to GET when HEAD is not allowed', async () => {
      await expect(probe.check(`${baseUrl}/no-head.png`)).resolves.toEqual(statusOutcome(404))
      expect(requests).toEqual(['HEAD /no-head.png', 'GET /no-head.png'])
    })

    it('should follow redirects to the final status', async () => {
      await expect(probe.check(`${baseUrl}/moved.png`)).resolves.toEqual(statusOutcome(404))
      expect(requests).toEqual(['HEAD /moved.png', 'HEAD /gone.png'])
    })

    it('should report a server error after the GET confirms it', async () => {
      await expect(probe.check(`${baseUrl}/broken.png`)).resolves.toEqual(statusOutcome(500))
      expect(requests).toEqual(['HEAD /broken.png', 'GET /broken.png'])
    })

    it('should stop reading the body of a fallback GET', async () => {
      const streamClosed = new Promise<void>((resolve) => {
        onStreamClosed = resolve
      })

      await expect(probe.check(`${baseUrl}/endless.png`)).resolves.toEqual(statusOutcome(200))
      await streamClosed

      expect(requests).toEqual(['HEAD /endless.png', 'GET /endless.png'])
    })

    it('should classify a timeout as ETIMEDOUT', async () => {
      await expect(probe.check(`${baseUrl}/slow.png`, 50)).resolves.toEqual(errorOutcome('ETIMEDOUT'))
    })

    it('should classify a closed port as ECONNREFUSED after retrying', async () => {
      const closed = createServer()
      const closedUrl = await listen(closed)
      await close(closed)
      const sleep = jest.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined)
      const retrying = new Probe({ retries: 1, backoffMs: 5 }, { client: createHttpClient(), sleep })

      await expect(retrying.check(`${closedUrl}/x.png`)).resolves.toEqual(errorOutcome('ECONNREFUSED'))
      expect(sleep).toHaveBeenCalledTimes(1)
      expect(sleep).toHaveBeenCalledWith(5)
    })
  })
})
