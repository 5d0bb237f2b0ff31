export type Credentials = {
  username: string;
  password: string;
};

/** A QR code image as the portal renders it: a `data:image/png;base64,...` URL. */
export type PortalQrImage = {
  src: string;
};

export interface PortalClient {
  fetchCsrf(): Promise<string>;
  login(credentials: Credentials, csrf?: string): Promise<void>;
  fetchToken(): Promise<string>;
  fetchQrImages(count: number): Promise<PortalQrImage[]>;
}
