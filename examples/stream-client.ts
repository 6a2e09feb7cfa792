/**
 * Example streaming client for stream-spoof-detector
 *
 * Streams a synthetic tone in 250ms chunks and prints every verdict.
 * Usage: tsx examples/stream-client.ts [ws-url] [client-id]
 */

import WebSocket from 'ws'
import { encodeSamplesBase64 } from '../src/index.js'

const WS_URL = process.argv[2] ?? 'ws://localhost:8765/ws/detect'
const CLIENT_ID = process.argv[3] ?? 'example-client'
const SAMPLE_RATE = 16000
const CHUNK_SAMPLES = SAMPLE_RATE / 4
const CHUNK_COUNT = 12

function toneChunk(index: number): Float32Array {
  const samples = new Float32Array(CHUNK_SAMPLES)
  for (let i = 0; i < samples.length; i++) {
    const t = (index * CHUNK_SAMPLES + i) / SAMPLE_RATE
    samples[i] = 0.3 * Math.sin(2 * Math.PI * 440 * t)
  }
  return samples
}

console.log(`Connecting to: ${WS_URL}`)

const ws = new WebSocket(WS_URL)

ws.on('open', () => {
  console.log('✓ Connected to server')
  ws.send(JSON.stringify({ type: 'connect', client_id: CLIENT_ID, timestamp: Date.now() / 1000 }))
})

ws.on('message', (data: WebSocket.RawData) => {
  const message: unknown = JSON.parse(data.toString())
  console.log('← Server message:', message)

  if (typeof message !== 'object' || message === null || !('type' in message)) {
    return
  }

  if (message.type === 'connected') {
    for (let i = 0; i < CHUNK_COUNT; i++) {
      ws.send(
        JSON.stringify({
          type: 'audio_chunk',
          audio_data: encodeSamplesBase64(toneChunk(i)),
          sample_rate: SAMPLE_RATE,
          encoding: 'base64',
          timestamp: Date.now() / 1000
        })
      )
    }
    ws.send(JSON.stringify({ type: 'stats' }))
  }

  if (message.type === 'stats') {
    console.log('✓ Streaming completed, closing connection')
    ws.close()
  }
})

ws.on('error', (error) => {
  console.error('✗ WebSocket error:', error.message)
})

ws.on('close', (code) => {
  console.log(`✗ Connection closed (${code})`)
})
