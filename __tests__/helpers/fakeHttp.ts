/**
 * In-process stand-in for the ShotGrid and FileMaker HTTP endpoints: an
 * axios instance whose adapter answers from a responder function.
 */
import axios, {
  AxiosAdapter,
  AxiosError,
  AxiosInstance,
  InternalAxiosRequestConfig,
} from 'axios'

export interface RecordedRequest {
  method: string
  url: string
  data: unknown
  headers: Record<string, unknown>
  params: unknown
}

export interface FakeReply {
  status: number
  data?: unknown
}

export type Responder = (
  request: RecordedRequest,
  config: InternalAxiosRequestConfig,
) => FakeReply | Error

const parseBody = (data: unknown): unknown => {
  if (typeof data !== 'string') return data
  try {
    return JSON.parse(data)
  } catch {
    return data
  }
}

export const createFakeHttp = (
  responder: Responder,
): { client: AxiosInstance; requests: RecordedRequest[] } => {
  const requests: RecordedRequest[] = []

  const adapter: AxiosAdapter = async (config) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      data: parseBody(config.data),
      headers: config.headers.toJSON(),
      params: config.params,
    }
    requests.push(request)

    const reply = responder(request, config)
    if (reply instanceof Error) throw reply

    return {
      data: reply.data,
      status: reply.status,
      statusText: '',
      headers: {},
      config,
    }
  }

  return {
    client: axios.create({ adapter, validateStatus: () => true }),
    requests,
  }
}

export const timeoutError = (config: InternalAxiosRequestConfig): AxiosError =>
  new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', config)

export const networkError = (config: InternalAxiosRequestConfig): AxiosError =>
  new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config)

/** Header lookup that ignores the case axios stored the name in */
export const headerOf = (request: RecordedRequest, name: string): unknown => {
  const key = Object.keys(request.headers).find((k) => k.toLowerCase() === name.toLowerCase())
  return key === undefined ? undefined : request.headers[key]
}
