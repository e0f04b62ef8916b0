export interface TokenPort {
  fetchToken(email: string): Promise<string>;
}
