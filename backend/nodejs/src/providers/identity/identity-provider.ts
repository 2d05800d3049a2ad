export interface CallerIdentity {
  account: string
  arn: string
  userId: string
}

export interface IdentityProvider {
  /** Resolves who the ambient AWS credentials belong to. */
  getCallerIdentity(): Promise<CallerIdentity>
}
