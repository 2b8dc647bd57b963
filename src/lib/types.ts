/**
 * Shared type definitions for cdev
 */

// Where and how to reach a server's dev API
export interface CdevConnection {
  host: string
  password?: string
  port: number
  username?: string
}

// Single entry in ~/.cdev/instances.yaml
export interface CdevInstance extends CdevConnection {
  name: string
}

// Connection options as given on the command line
export interface ConnectionOptions {
  host?: string
  instance?: string
  password?: string
  port?: number
  username?: string
}

export type HttpMethod = 'GET' | 'POST' | 'PUT'
