import assert from 'node:assert/strict'
import test from 'node:test'
import {
  FacilitatorClient,
  FacilitatorClientError,
  type VerifyRequest,
} from '../src/index.js'

const verifyRequestFixture: VerifyRequest = {
  x402Version: 1,
  paymentPayload: {
    x402Version: 1,
    scheme: 'exact',
    network: 'base-sepolia',
    payload: {
      signature: '0x1234',
      authorization: {
        from: '0x0000000000000000000000000000000000000001',
        to: '0x0000000000000000000000000000000000000002',
        value: '10000',
        validAfter: '0',
        validBefore: '9999999999',
        nonce: '0xabc',
      },
    },
  },
  paymentRequirements: {
    scheme: 'exact',
    network: 'base-sepolia',
    maxAmountRequired: '10000',
    resource: 'http://localhost:3001/resource',
    description: 'test resource',
    mimeType: 'application/json',
    payTo: '0x0000000000000000000000000000000000000002',
    maxTimeoutSeconds: 60,
    asset: '0x036CbD53842c5426634e7929541eC2318f3dCF7e',
  },
}

test('verify() posts the request and returns the parsed verdict', async () => {
  let capturedUrl: string | undefined
  let capturedInit: RequestInit | undefined

  const client = new FacilitatorClient({
    baseUrl: 'https://example.com/',
    fetchImpl: async (input, init) => {
      capturedUrl = String(input)
      capturedInit = init
      return new Response(JSON.stringify({ isValid: true, payer: '0xpayer' }), { status: 200 })
    },
  })

  const result = await client.verify(verifyRequestFixture)
  assert.deepEqual(result, { isValid: true, payer: '0xpayer' })
  assert.equal(capturedUrl, 'https://example.com/verify')
  assert.equal(capturedInit?.method, 'POST')
  assert.deepEqual(JSON.parse(String(capturedInit?.body)), verifyRequestFixture)
})

test('settle() returns the settlement receipt', async () => {
  const settlement = {
    success: true,
    payer: '0xpayer',
    transaction: '0xfeed',
    network: 'base-sepolia',
  }
  const client = new FacilitatorClient({
    baseUrl: 'https://example.com',
    fetchImpl: async () => new Response(JSON.stringify(settlement), { status: 200 }),
  })

  assert.deepEqual(await client.settle(verifyRequestFixture), settlement)
})

test('supported() lists the facilitator kinds', async () => {
  const client = new FacilitatorClient({
    baseUrl: 'https://example.com',
    fetchImpl: async () => new Response(
      JSON.stringify({ kinds: [{ x402Version: 1, scheme: 'exact', network: 'base-sepolia' }] }),
      { status: 200 }
    ),
  })

  const result = await client.supported()
  assert.deepEqual(result.kinds, [{ x402Version: 1, scheme: 'exact', network: 'base-sepolia' }])
})

test('http errors include structured status and body details', async () => {
  const client = new FacilitatorClient({
    baseUrl: 'https://example.com',
    fetchImpl: async () => new Response(JSON.stringify({ error: 'invalid_signature' }), { status: 400 }),
  })

  await assert.rejects(
    () => client.settle(verifyRequestFixture),
    (error: unknown) => {
      assert.ok(error instanceof FacilitatorClientError)
      assert.equal(error.code, 'http_error')
      assert.equal(error.status, 400)
      assert.deepEqual(error.details, { error: 'invalid_signature' })
      return true
    }
  )
})

test('responses of the wrong shape are reported as invalid_response', async () => {
  const client = new FacilitatorClient({
    baseUrl: 'https://example.com',
    fetchImpl: async () => new Response('{"valid":"yes"}', { status: 200 }),
  })

  await assert.rejects(
    () => client.verify(verifyRequestFixture),
    (error: unknown) => {
      assert.ok(error instanceof FacilitatorClientError)
      assert.equal(error.code, 'invalid_response')
      assert.equal(error.path, '/verify')
      return true
    }
  )
})

test('network failures are mapped to network_error', async () => {
  const client = new FacilitatorClient({
    baseUrl: 'https://example.com',
    fetchImpl: async () => {
      throw new TypeError('fetch failed')
    },
  })

  await assert.rejects(
    () => client.supported(),
    (error: unknown) => {
      assert.ok(error instanceof FacilitatorClientError)
      assert.equal(error.code, 'network_error')
      return true
    }
  )
})

test('timeout errors are mapped consistently', async () => {
  const client = new FacilitatorClient({
    baseUrl: 'https://example.com',
    timeoutMs: 5,
    fetchImpl: async (_input, init) => {
      return await new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }))
        })
      })
    },
  })

  await assert.rejects(
    () => client.verify(verifyRequestFixture),
    (error: unknown) => {
      assert.ok(error instanceof FacilitatorClientError)
      assert.equal(error.code, 'timeout')
      assert.equal(error.path, '/verify')
      return true
    }
  )
})
