#!/usr/bin/env node
import * as cdk from "aws-cdk-lib";
import { SesMailerStatefulStack } from "../lib/stateful-stack.js";
import { SesMailerStatelessStack } from "../lib/stateless-stack.js";

const app = new cdk.App();

const senderEmail: unknown = app.node.tryGetContext("senderEmail");

// Stateful stack - persistent resources (SSM Parameters)
new SesMailerStatefulStack(app, "SesMailerStatefulStack", {
  env: {
    region: process.env.CDK_DEFAULT_REGION ?? "us-east-1",
  },
  senderEmail: typeof senderEmail === "string" ? senderEmail : undefined,
  description: "Stateful resources for the SES mailer",
});

// Stateless stack - send-email Lambda
new SesMailerStatelessStack(app, "SesMailerStatelessStack", {
  env: {
    region: process.env.CDK_DEFAULT_REGION ?? "us-east-1",
  },
  description: "SES mailer send-email function",
});
