export interface Profile {
  name: string;
  server: string;
  apiKey: string;
  fromAddress?: string;
  fromName?: string;
}

export interface AddProfileOptions {
  makeDefault?: boolean;
}
