export enum StatefulStackExportsEnum {
  SENDER_EMAIL_PARAM = "SesMailerSenderEmailParamName",
}
