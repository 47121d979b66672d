import axios, { type AxiosAdapter, type AxiosInstance, isAxiosError, isCancel } from 'axios'
import {
   DEFAULT_LOCALE_LANGUAGE,
   DEFAULT_LOCALE_SITE,
   DIGIKEY_API_URL,
   DIGIKEY_SANDBOX_API_URL,
   LOOKUP_TIMEOUT_MS,
} from '../../config/settings'
import { LookupFailure, errorMessage } from '../../utils/errors'
import { json } from '../../utils/json'

export interface DigikeyApiConfig {
   clientId: string
   /** A pre-issued OAuth access token; this service never runs the OAuth flow. */
   accessToken: string
   sandbox?: boolean
   localeLanguage?: string
   localeSite?: string
   timeoutMs?: number
   /** Replaces the HTTP transport, e.g. with an in-process stub. */
   adapter?: AxiosAdapter
}

/**
 * Reads the DigiKey credentials and locale from the environment.
 * @throws When a required variable is missing.
 */
export function digikeyConfigFromEnv(): DigikeyApiConfig {
   const {
      DIGIKEY_CLIENT_ID,
      DIGIKEY_ACCESS_TOKEN,
      DIGIKEY_SANDBOX,
      DIGIKEY_LOCALE_LANGUAGE,
      DIGIKEY_LOCALE_SITE,
   } = process.env

   if (!DIGIKEY_CLIENT_ID) throw new Error(
      'DIGIKEY_CLIENT_ID must be set in environment variables'
   )

   if (!DIGIKEY_ACCESS_TOKEN) throw new Error(
      'DIGIKEY_ACCESS_TOKEN must be set in environment variables'
   )

   return {
      clientId: DIGIKEY_CLIENT_ID,
      accessToken: DIGIKEY_ACCESS_TOKEN,
      sandbox: DIGIKEY_SANDBOX === 'true',
      localeLanguage: DIGIKEY_LOCALE_LANGUAGE,
      localeSite: DIGIKEY_LOCALE_SITE,
   }
}

/**
 * Creates a dedicated axios instance for DigiKey API calls.
 * Every rejection it produces is a LookupFailure.
 */
export function createDigikeyApi(config: DigikeyApiConfig): AxiosInstance {
   const digikeyApi = axios.create({
      baseURL: config.sandbox ? DIGIKEY_SANDBOX_API_URL : DIGIKEY_API_URL,
      timeout: config.timeoutMs ?? LOOKUP_TIMEOUT_MS,
      adapter: config.adapter,
   })

   // Request Interceptor: injects the client id, token and locale into every request
   digikeyApi.interceptors.request.use((request) => {
      request.headers['X-DIGIKEY-Client-Id'] = config.clientId
      request.headers['Authorization'] = `Bearer ${config.accessToken}`
      request.headers['X-DIGIKEY-Locale-Language'] = config.localeLanguage || DEFAULT_LOCALE_LANGUAGE
      request.headers['X-DIGIKEY-Locale-Site'] = config.localeSite || DEFAULT_LOCALE_SITE
      return request
   })

   // Response Interceptor: normalizes every failure
   digikeyApi.interceptors.response.use(
      (response) => response,
      (error) => Promise.reject(toLookupFailure(error))
   )

   return digikeyApi
}

function toLookupFailure(error: unknown): LookupFailure {
   if (error instanceof LookupFailure) return error
   if (isCancel(error)) return new LookupFailure('DigiKey request cancelled')
   if (!isAxiosError(error)) return new LookupFailure(errorMessage(error))

   const url = error.config?.url
   if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new LookupFailure(`DigiKey request to ${url} timed out`)
   }

   const status = error.response?.status
   if (status === undefined) {
      return new LookupFailure(`DigiKey request to ${url} failed: ${error.message}`)
   }

   const body = json.stringify(error.response?.data ?? '')
   return new LookupFailure(`DigiKey ${url} responded ${status}: ${body}`, status)
}
