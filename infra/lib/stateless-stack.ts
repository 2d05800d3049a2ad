import * as cdk from "aws-cdk-lib";
import { Construct } from "constructs";
import * as lambda from "aws-cdk-lib/aws-lambda";
import * as path from "path";
import { fileURLToPath } from "url";
import * as nodeLambda from "aws-cdk-lib/aws-lambda-nodejs";
import { OutputFormat } from "aws-cdk-lib/aws-lambda-nodejs";
import * as iam from "aws-cdk-lib/aws-iam";
import { StatefulStackExportsEnum } from "./enums/exports-enum.js";

const currentDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * SES Mailer - Stateless Stack
 *
 * The send-email Lambda and the permissions it needs on SES and SSM.
 */
export class SesMailerStatelessStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props?: cdk.StackProps) {
    super(scope, id, props);

    const senderEmailParamName = cdk.Fn.importValue(
      StatefulStackExportsEnum.SENDER_EMAIL_PARAM
    );

    const sendEmail = new nodeLambda.NodejsFunction(this, "SendEmail", {
      handler: "sendEmailHandler",
      entry: path.join(
        currentDir,
        "../../backend/nodejs/src/lambdas/send-email.ts"
      ),
      description: "Send structured or raw MIME email via SES",
      memorySize: 256,
      timeout: cdk.Duration.seconds(15),
      environment: {
        SENDER_EMAIL_PARAM: senderEmailParamName,
        POWERTOOLS_SERVICE_NAME: "ses-mailer",
        POWERTOOLS_LOG_LEVEL: "INFO",
      },
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.ARM_64,
      tracing: lambda.Tracing.ACTIVE,
      bundling: {
        minify: true,
        sourceMap: true,
        format: OutputFormat.ESM,
        target: "node20",
      },
    });

    sendEmail.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["ssm:GetParameter"],
        resources: [
          `arn:aws:ssm:${this.region}:${this.account}:parameter/ses-mailer/*`,
        ],
      })
    );

    sendEmail.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["ses:SendEmail", "ses:SendRawEmail"],
        resources: ["*"], // SES doesn't support resource-level permissions
      })
    );

    new cdk.CfnOutput(this, "SendEmailFunctionArn", {
      value: sendEmail.functionArn,
      description: "ARN of the send-email Lambda",
    });
  }
}
