import axios, { AxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios'
import { DASHBOARD_CONFIG } from '@/config/settings'
import { logger } from '@/lib/logger'
import type { ApiError } from '@/types'

const log = logger.child('api')

export class ApiClient {
  private client: AxiosInstance

  constructor(baseURL = DASHBOARD_CONFIG.apiBaseUrl) {
    this.client = axios.create({
      baseURL,
      headers: {
        'Content-Type': 'application/json',
      },
      timeout: 30000,
    })

    this.setupInterceptors()
  }

  private setupInterceptors(): void {
    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError<ApiError>) => {
        const failure = toRequestError(error)
        log.error(`${error.config?.method?.toUpperCase() ?? 'GET'} ${error.config?.url ?? ''} failed`, failure, {
          status: failure.status,
          code: failure.code,
        })
        return Promise.reject(failure)
      }
    )
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.client.get<T>(url, config)
    return response.data
  }

  getAxiosInstance(): AxiosInstance {
    return this.client
  }
}

function toRequestError(error: AxiosError<ApiError>): ApiRequestError {
  if (error.response?.status === 404) {
    return new ApiRequestError('Resource not found', 404, 'NOT_FOUND', error.response.data)
  }

  if (error.response?.status && error.response.status >= 500) {
    return new ApiRequestError('Server error', error.response.status, 'SERVER_ERROR')
  }

  if (error.code === 'ECONNABORTED') {
    return new ApiRequestError('Request timeout', 408, 'TIMEOUT')
  }

  if (!error.response) {
    return new ApiRequestError('Network error', 0, 'NETWORK_ERROR')
  }

  return new ApiRequestError(
    error.response.data?.error || 'Request failed',
    error.response.status,
    error.response.data?.code || 'UNKNOWN',
    error.response.data
  )
}

export class ApiRequestError extends Error {
  status: number
  code: string
  details?: ApiError

  constructor(message: string, status: number, code: string, details?: ApiError) {
    super(message)
    this.name = 'ApiRequestError'
    this.status = status
    this.code = code
    this.details = details
  }
}

const apiClient = new ApiClient()

export { apiClient }
export default apiClient
