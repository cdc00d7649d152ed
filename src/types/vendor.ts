/** Shape shared by every SmartAPI response body. */
export namespace Vendor {
  export interface Envelope<T> {
    status: boolean;
    message: string;
    errorcode: string;
    data: T;
  }
}
