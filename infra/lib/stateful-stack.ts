import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";
import * as ssm from "aws-cdk-lib/aws-ssm";
import { StatefulStackExportsEnum } from "./enums/exports-enum.js";

export interface SesMailerStatefulStackProps extends cdk.StackProps {
  /** Initial value of the sender parameter; must be verified in SES. */
  senderEmail?: string;
}

export class SesMailerStatefulStack extends cdk.Stack {
  constructor(
    scope: Construct,
    id: string,
    props?: SesMailerStatefulStackProps
  ) {
    super(scope, id, props);

    const senderEmailParam = new ssm.StringParameter(this, "SenderEmailParam", {
      parameterName: "/ses-mailer/sender-email",
      stringValue: props?.senderEmail ?? "noreply@example.com", // Replace with your verified email
      description: "Sender address for SES (must be verified in SES)",
    });

    new cdk.CfnOutput(this, "SenderEmailParamName", {
      value: senderEmailParam.parameterName,
      exportName: StatefulStackExportsEnum.SENDER_EMAIL_PARAM,
      description: "SSM Parameter name for the sender email",
    });
  }
}
