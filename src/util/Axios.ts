import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse, RawAxiosRequestHeaders } from 'axios'
import type { Agent } from 'http'
import { HttpProxyAgent } from 'http-proxy-agent'
import { HttpsProxyAgent } from 'https-proxy-agent'
import { SocksProxyAgent } from 'socks-proxy-agent'

import { AbortError } from './Errors'
import Util from './Utils'

export interface AxiosClientOptions {
    proxy?: string
    timeout?: number
    headers?: RawAxiosRequestHeaders
    // Attempts for network-level failures (connection refused/reset, timeouts)
    maxAttempts?: number
    // Replaces the transport; tests use it to answer requests in-process
    adapter?: AxiosAdapter
    // Session signal: cancels in-flight requests and the retry backoff
    signal?: AbortSignal
}

export type AxiosClientFactory = (proxy?: string) => AxiosClient

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNRESET', 'ENOTFOUND', 'ECONNABORTED'])

class AxiosClient {
    public readonly proxy: string | undefined
    private instance: AxiosInstance
    private agents: Agent[] = []
    private maxAttempts: number
    private closed = false
    private readonly signal: AbortSignal | undefined
    private readonly utils: Util

    constructor(options: AxiosClientOptions = {}) {
        this.proxy = options.proxy
        this.maxAttempts = Math.max(1, options.maxAttempts ?? 2)
        this.signal = options.signal
        this.utils = new Util(options.signal)
        this.instance = axios.create({
            timeout: options.timeout ?? 60_000,
            headers: options.headers,
            adapter: options.adapter,
            // status codes are inspected by the callers
            validateStatus: () => true,
            // when using custom agents, disable axios built-in proxy handling
            proxy: false
        })

        if (this.proxy) {
            const { httpAgent, httpsAgent } = AxiosClient.getAgentsForProxy(this.proxy)
            this.instance.defaults.httpAgent = httpAgent
            this.instance.defaults.httpsAgent = httpsAgent
            this.agents = [httpAgent, httpsAgent]
        }
    }

    /**
     * Build agents for the provided proxy URL:
     *  - accepts scheme-less host (assumes http)
     *  - normalizes socks5h:// -> socks5://
     *  - re-encodes username/password into the proxy URL
     */
    static getAgentsForProxy(proxy: string): { httpAgent: Agent, httpsAgent: Agent } {
        let urlStr = proxy.trim()

        // If user provided only host/IP without scheme, assume http
        if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(urlStr)) {
            urlStr = `http://${urlStr}`
        }
        urlStr = urlStr.replace(/^socks5h:\/\//i, 'socks5://')

        const parsed = new URL(urlStr)
        const cred = parsed.username
            ? `${encodeURIComponent(decodeURIComponent(parsed.username))}:${encodeURIComponent(decodeURIComponent(parsed.password))}@`
            : ''
        const hostPort = `${parsed.hostname}${parsed.port ? `:${parsed.port}` : ''}`
        const proxyUrl = `${parsed.protocol}//${cred}${hostPort}`

        if (parsed.protocol === 'http:' || parsed.protocol === 'https:') {
            return { httpAgent: new HttpProxyAgent(proxyUrl), httpsAgent: new HttpsProxyAgent(proxyUrl) }
        }
        if (parsed.protocol.startsWith('socks')) {
            const agent = new SocksProxyAgent(proxyUrl)
            return { httpAgent: agent, httpsAgent: agent }
        }
        throw new Error(`Unsupported proxy protocol: ${parsed.protocol}`)
    }

    get isClosed(): boolean {
        return this.closed
    }

    // Generic method to make any Axios request
    public async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        if (this.closed) {
            throw new Error('HTTP client is closed')
        }

        let lastError: unknown
        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            try {
                return await this.instance.request<T>({ signal: this.signal, ...config })
            } catch (err: unknown) {
                if (axios.isCancel(err)) throw new AbortError()
                lastError = err
                if (!AxiosClient.isNetworkError(err) || attempt === this.maxAttempts) {
                    throw err
                }
                // Exponential backoff: 1s, 2s, 4s, ...
                await this.utils.wait(1000 * Math.pow(2, attempt - 1))
            }
        }

        throw lastError
    }

    public close(): void {
        if (this.closed) return
        this.closed = true
        for (const agent of this.agents) {
            agent.destroy()
        }
        this.agents = []
    }

    static isNetworkError(err: unknown): boolean {
        if (!axios.isAxiosError(err)) return false
        if (err.response) return false
        const code = err.code ?? ''
        return NETWORK_ERROR_CODES.has(code) || /proxy|tunnel|socks/i.test(err.message)
    }
}

export default AxiosClient
