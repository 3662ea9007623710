import { TransportError } from '@smsbridge/core'
import type { WireFields } from '@smsbridge/core'
import { encodeForm } from './form.js'

export const DEFAULT_API_URL = 'https://simple.pswin.com/'

/**
 * Response of the gateway HTTP endpoint
 */
export interface HttpResponse {
  status: number
  body: string
}

/**
 * Port for issuing the form POST to the gateway.
 * Tests pass a stub instead of reaching the network.
 */
export interface HttpTransport {
  post(url: string, body: string, headers: Record<string, string>): Promise<HttpResponse>
}

/**
 * HttpTransport over the global fetch
 */
export const fetchTransport: HttpTransport = {
  async post(url, body, headers) {
    const response = await fetch(url, { method: 'POST', headers, body })
    return { status: response.status, body: await response.text() }
  },
}

export interface PswinHttpApiOptions {
  user: string
  password: string
  /** @default DEFAULT_API_URL */
  apiUrl?: string
  /** @default fetchTransport */
  transport?: HttpTransport
}

/**
 * PSWin HTTP API client
 *
 * Adds account credentials to the request fields and posts them form-encoded
 * in the gateway's single-byte charset.
 */
export class PswinHttpApi {
  readonly apiUrl: string
  private user: string
  private password: string
  private transport: HttpTransport

  constructor(options: PswinHttpApiOptions) {
    this.user = options.user
    this.password = options.password
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL
    this.transport = options.transport ?? fetchTransport
  }

  /**
   * Post request fields to the gateway
   * @throws {TransportError} If the request could not be completed
   */
  async request(fields: WireFields): Promise<HttpResponse> {
    const body = encodeForm({ ...fields, USER: this.user, PW: this.password })

    try {
      return await this.transport.post(this.apiUrl, body, {
        'Content-Type': 'application/x-www-form-urlencoded; charset=ISO-8859-1',
      })
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error))
      throw new TransportError(`Failed to reach PSWin gateway: ${cause.message}`, cause)
    }
  }
}
