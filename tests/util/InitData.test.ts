import fs from 'fs'
import path from 'path'
import { describe, expect, it } from 'vitest'

import { AccountInitDataSource, extractInitData, userIdFromInitData } from '../../src/util/InitData'
import { makeAccount, tmpDir } from '../helpers'

const WEB_APP_URL = 'https://web.app.test/#tgWebAppData=query_id%3Dabc%26user%3D%257B%2522id%2522%253A7%257D%26hash%3Dtest-hash&tgWebAppVersion=7.0'

describe('extractInitData', () => {
    it('pulls init data out of a web-app URL', () => {
        expect(extractInitData(WEB_APP_URL)).toBe('query_id=abc&user=%7B%22id%22%3A7%7D&hash=test-hash')
    })

    it('returns raw init data trimmed', () => {
        expect(extractInitData('  query_id=abc&hash=x \n')).toBe('query_id=abc&hash=x')
    })
})

describe('userIdFromInitData', () => {
    it('reads the numeric user id', () => {
        expect(userIdFromInitData(extractInitData(WEB_APP_URL))).toBe(7)
    })

    it('is undefined without a user field', () => {
        expect(userIdFromInitData('query_id=abc')).toBeUndefined()
    })
})

describe('AccountInitDataSource', () => {
    it('prefers the init data file over the inline value', async () => {
        const file = path.join(tmpDir(), 'session.txt')
        fs.writeFileSync(file, `${WEB_APP_URL}\n`)
        const source = new AccountInitDataSource(makeAccount({ initData: 'inline', initDataFile: file }))
        expect(await source.getInitData()).toBe('query_id=abc&user=%7B%22id%22%3A7%7D&hash=test-hash')
    })

    it('falls back to inline init data, empty when none', async () => {
        expect(await new AccountInitDataSource(makeAccount({ initData: 'inline' })).getInitData()).toBe('inline')
        expect(await new AccountInitDataSource(makeAccount({ initData: undefined })).getInitData()).toBe('')
    })
})
