import axios, { AxiosInstance } from 'axios'

export const HTTP_CLIENT = Symbol('HTTP_CLIENT')

export function createHttpClient(): AxiosInstance {
  return axios.create({ maxRedirects: 5 })
}
