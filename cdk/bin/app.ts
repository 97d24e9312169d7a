import * as cdk from "aws-cdk-lib";
import { DocumentSummarizerStack } from "../lib/documentSummarizerStack.js";
import { LambdaNodeDefaults } from "../lib/lambdaNodeDefaults.js";

const app = new cdk.App();
cdk.PropertyInjectors.of(app).add(new LambdaNodeDefaults());

const alarmEmail: unknown = app.node.tryGetContext("alarmEmail");

new DocumentSummarizerStack(app, "DocumentSummarizerStack", {
  alarmEmail: typeof alarmEmail === "string" ? alarmEmail : undefined,
});
