import {test, expect, vi} from 'vitest'
import sodium from 'libsodium-wrappers-sumo'
import {
  acquireSession, refreshSession, authHeaders, sessionIdFrom, requestBinaryInform,
  expectProtocolOk, newFUSClient, type Session
} from '../src/client.js'
import {FUSAuthError, FUSProtocolError, FUSTransportError} from '../src/errors.js'
import {decodeFUSMessage} from '../src/protocol/messages.js'
import {
  fakeResponse, fusResponseXml, nonceResponse, testClient, encodeNonce, TEST_TACS
} from './fixtures.js'

await sodium.ready

const SESSION: Session = {rawNonce: 'N1', decodedNonce: 'plain-N1', signature: 'sig-plain-N1', sessionId: 'S1'}

// T1: nonce challenge
test('acquireSession derives a session from the nonce response', async () => {
  const {client, requests} = await testClient(() => nonceResponse('N1', 'S1'))
  expect(await acquireSession(client)).toEqual(SESSION)
  const [req] = requests()
  expect(req.method).toBe('POST')
  expect(req.url).toBe('https://neofussvr.sslcs.cdngc.net/NF_DownloadGenerateNonce.do')
  expect(req.headers).toEqual({
    'Authorization': 'FUS nonce="", signature="", nc="", type="", realm="", newauth="1"',
    'User-Agent': 'Kies2.0_FUS'
  })
})

test('acquireSession rejects responses without a usable nonce', async () => {
  const missing = await testClient(() => fakeResponse({status: 200}))
  await expect(acquireSession(missing.client)).rejects.toMatchObject({errorType: 'SERVER_REJECTED', code: 200})
  const failed = await testClient(() => fakeResponse({status: 503, headers: {NONCE: 'N1'}}))
  await expect(acquireSession(failed.client)).rejects.toMatchObject({errorType: 'SERVER_REJECTED', code: 503})

  // Real session crypto: a nonce that is not valid base64 is a server rejection.
  const send = vi.fn(async () => fakeResponse({headers: {NONCE: '!!!'}}))
  const client = await newFUSClient({transport: {send}, tacTable: TEST_TACS})
  const err = await acquireSession(client).catch((e: unknown) => e)
  expect(err).toBeInstanceOf(FUSProtocolError)
  expect(err instanceof FUSProtocolError && err.errorType).toBe('SERVER_REJECTED')
})

test('acquireSession with the FUS transform decodes the nonce', async () => {
  const send = vi.fn(async () => fakeResponse({headers: {NONCE: encodeNonce('Zb3Kq8Lm2Np4Rs6T')}}))
  const client = await newFUSClient({transport: {send}, tacTable: TEST_TACS})
  const session = await acquireSession(client)
  expect(session.decodedNonce).toBe('Zb3Kq8Lm2Np4Rs6T')
  expect(session.sessionId).toBe('')
  expect(authHeaders(client, session)['Cookie']).toBeUndefined()
})

// T2: transport failures
test('requests that exceed the timeout fail with TIMEOUT', async () => {
  const error = vi.spyOn(console, 'error').mockImplementation(() => {})
  const {client} = await testClient((_req, signal) => new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), {name: 'AbortError'})))
  }), {timeoutMs: 20})
  const err = await acquireSession(client).catch((e: unknown) => e)
  expect(err).toBeInstanceOf(FUSTransportError)
  expect(err instanceof FUSTransportError && err.errorType).toBe('TIMEOUT')
  expect(error).toHaveBeenCalled()
  error.mockRestore()
})

test('network failures map to UNREACHABLE', async () => {
  const error = vi.spyOn(console, 'error').mockImplementation(() => {})
  const {client} = await testClient(() => Promise.reject(new TypeError('fetch failed')))
  await expect(acquireSession(client)).rejects.toMatchObject({name: 'FUSProtocolError', errorType: 'UNREACHABLE'})
  error.mockRestore()
})

// T3: session refresh
test('refreshSession derives a new session when the nonce rotates', async () => {
  const {client} = await testClient(() => nonceResponse())
  const rotated = refreshSession(client, SESSION, fakeResponse({headers: {NONCE: 'N2'}}))
  expect(rotated).toEqual({rawNonce: 'N2', decodedNonce: 'plain-N2', signature: 'sig-plain-N2', sessionId: 'S1'})
  expect(SESSION.rawNonce).toBe('N1')
  expect(refreshSession(client, SESSION, fakeResponse({headers: {NONCE: 'N1'}}))).toBe(SESSION)
  expect(refreshSession(client, SESSION, fakeResponse())).toBe(SESSION)
  expect(refreshSession(client, SESSION, fakeResponse({headers: {'Set-Cookie': 'JSESSIONID=S9; Path=/'}})))
    .toEqual({...SESSION, sessionId: 'S9'})
})

test('sessionIdFrom reads the JSESSIONID cookie', () => {
  expect(sessionIdFrom(fakeResponse({headers: {'Set-Cookie': 'JSESSIONID=abc; Path=/, other=1'}}))).toBe('abc')
  expect(sessionIdFrom(fakeResponse({headers: {'Set-Cookie': 'a=1, JSESSIONID=def; Path=/'}}))).toBe('def')
  expect(sessionIdFrom(fakeResponse({headers: {'Set-Cookie': 'a=1'}}))).toBeNull()
  expect(sessionIdFrom(fakeResponse())).toBeNull()
})

// T4: authenticated requests
test('requestBinaryInform sends auth headers and a logic check', async () => {
  const {client, requests} = await testClient(() => fakeResponse({body: fusResponseXml(200)}))
  const {envelope} = await requestBinaryInform(client, SESSION, {
    region: 'EUX', model: 'SM-G960F', firmware: 'G960FXXU1ASCD/G960FOXM1ASCD/G960FXXU1ASC7/G960FXXU1ASCD', imei: '350001100000000'
  })
  expect(envelope.status).toBe(200)
  const [req] = requests()
  expect(req.url).toBe('https://neofussvr.sslcs.cdngc.net/NF_DownloadBinaryInform.do')
  expect(req.headers).toEqual({
    'Authorization': 'FUS nonce="N1", signature="sig-plain-N1", nc="", type="", realm="", newauth="1"',
    'User-Agent': 'Kies2.0_FUS',
    'Cookie': 'JSESSIONID=S1',
    'Content-Type': 'application/xml'
  })
  const sent = decodeFUSMessage(req.body ?? '')
  expect(sent.put.get('LOGIC_CHECK')).toBe('G960:plain-N1')
  expect(sent.put.get('CLIENT_VERSION')).toBe('4.3.23123_1')
})

test('expectProtocolOk maps protocol statuses', () => {
  expect(() => expectProtocolOk(decodeFUSMessage(fusResponseXml(200)), 200)).not.toThrow()
  expect(() => expectProtocolOk(decodeFUSMessage(fusResponseXml(401)), 200)).toThrow(FUSAuthError)
  expect(() => expectProtocolOk(decodeFUSMessage(fusResponseXml(400)), 200)).toThrow('Firmware server returned an unexpected status (400)')
  expect(() => expectProtocolOk(decodeFUSMessage('<FUSMsg/>'), 200)).toThrow('Firmware server returned an unexpected status (200)')
})
