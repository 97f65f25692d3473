export interface SendMailParams {
  to: string;
  subject: string;
  htmlBody: string;
  textBody?: string;
  from?: string;
}

export interface IMailClient {
  send(params: SendMailParams): Promise<{ id?: string }>;
}
