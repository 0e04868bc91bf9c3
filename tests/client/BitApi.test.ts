import { describe, expect, it } from 'vitest'

import { isOk } from '../../src/client/BitApi'
import { InvalidSession } from '../../src/util/Errors'
import { makeAccount, makeContext } from '../helpers'

describe('isOk', () => {
    it('accepts only the listed statuses', () => {
        expect(isOk(200)).toBe(true)
        expect(isOk(204)).toBe(false)
        expect(isOk(204, [200, 204])).toBe(true)
    })
})

describe('BitApi', () => {
    it('exchanges init data without a bearer token', async () => {
        const { ctx, server } = makeContext({ authenticated: false })
        server.on('POST', '/auth/token', { status: 200, data: { access_token: 'test-token' } })

        const res = await ctx.api.authenticate('query_id=test')

        expect(res.data.access_token).toBe('test-token')
        const [call] = server.calls
        expect(call?.url).toBe('https://api.test/auth/token')
        expect(call?.data).toEqual({ init_data: 'query_id=test' })
        expect(call?.headers['authorization']).toBeUndefined()
        expect(call?.headers['user-agent']).toBe('test-agent')
        expect(call?.headers['origin']).toBe('https://bitappprod.com')
    })

    it('sends the bearer token on authenticated calls', async () => {
        const { ctx, server } = makeContext()
        server.on('GET', '/users/me', { status: 200, data: { username: 'tester' } })

        await ctx.api.getMe()

        expect(server.calls[0]?.headers['authorization']).toBe('Bearer test-token')
    })

    it('pages list endpoints', async () => {
        const { ctx, server } = makeContext()
        await ctx.api.searchClans('Test Clan')
        await ctx.api.getReferrals()

        expect(server.calls[0]?.query).toEqual({ limit: '20', offset: '0', query: 'Test Clan' })
        expect(server.calls[1]?.path).toBe('/users/me/referrals')
        expect(server.calls[1]?.query).toEqual({ limit: '20', offset: '0' })
    })

    it('adds device headers to check-in and mini-game calls', async () => {
        const { ctx, server } = makeContext({ account: makeAccount({ devicePlatform: 'android' }) })
        await ctx.api.getCheckInAvailability()
        await ctx.api.submitDurovJump({ score: 300, start_at: '2026-01-15T12:00:00.000Z', end_at: '2026-01-15T12:01:00.000Z' })

        expect(server.calls[0]?.headers['x-device-platform']).toBe('android')
        expect(server.calls[0]?.headers['x-device-model']).toBe('test-agent')
        expect(server.calls[1]?.headers['referer']).toBe('https://bitappprod.com/durov-jump')
        expect(server.calls[1]?.headers['x-device-platform']).toBe('android')
    })

    it('uses DELETE to leave a clan', async () => {
        const { ctx, server } = makeContext()
        await ctx.api.leaveClan()
        expect(server.calls[0]).toMatchObject({ method: 'DELETE', path: '/clans/leave' })
    })

    it('refuses authenticated calls without a token', async () => {
        const { ctx, server } = makeContext({ authenticated: false })
        await expect(ctx.api.getTasks()).rejects.toBeInstanceOf(InvalidSession)
        expect(server.calls).toHaveLength(0)
    })

    it('refuses calls once the transport is closed', async () => {
        const { ctx } = makeContext()
        ctx.state.http.close()
        await expect(ctx.api.authenticate('x')).rejects.toThrow('No access token or HTTP client not initialized')
    })
})
