export interface MessageResponse {
  message: string;
}

export interface TokenResponse {
  accessToken: string;
  tokenType: 'bearer';
}
