export namespace Session {
  export interface Tokens {
    jwtToken: string;
    refreshToken: string;
    feedToken: string;
  }

  export interface Active extends Tokens {
    establishedAt: Date;
  }
}
