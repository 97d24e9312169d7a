import * as cdk from "aws-cdk-lib";
import * as iam from "aws-cdk-lib/aws-iam";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import * as s3 from "aws-cdk-lib/aws-s3";
import * as s3n from "aws-cdk-lib/aws-s3-notifications";
import * as sns from "aws-cdk-lib/aws-sns";
import * as snsSubscriptions from "aws-cdk-lib/aws-sns-subscriptions";
import { Construct } from "constructs";
import { SUPPORTED_EXTENSIONS } from "../../backend/utils/documentFormat.js";
import { LambdaAlarms } from "./lambdaAlarms.js";

export interface DocumentSummarizerStackProps extends cdk.StackProps {
  /** Address subscribed to alarm notifications */
  readonly alarmEmail?: string;
}

export class DocumentSummarizerStack extends cdk.Stack {
  constructor(scope: Construct, id: string, props: DocumentSummarizerStackProps = {}) {
    super(scope, id, props);

    const alarmTopic = new sns.Topic(this, "AlarmTopic", {
      displayName: "Document Summarizer Alarms",
    });
    if (props.alarmEmail) {
      alarmTopic.addSubscription(new snsSubscriptions.EmailSubscription(props.alarmEmail));
    }

    const documentBucket = new s3.Bucket(this, "DocumentBucket", {
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    // Polling alone may take 5 minutes (60 polls, 5 s apart) before chunks are summarized
    const summarizerLambda = new NodejsFunction(this, "DocumentSummarizer", {
      entry: "backend/events/processUpload.ts",
      timeout: cdk.Duration.minutes(15),
      memorySize: 1024,
      environment: {
        MAX_TOKENS_PER_CHUNK: "3000",
        MAX_OUTPUT_TOKENS: "500",
        POLL_INTERVAL_MS: "5000",
        MAX_POLL_ATTEMPTS: "60",
        THROTTLE_BASE_DELAY_MS: "2000",
        MAX_THROTTLE_RETRIES: "5",
      },
    });

    documentBucket.grantReadWrite(summarizerLambda);

    summarizerLambda.addToRolePolicy(
      new iam.PolicyStatement({
        actions: [
          "textract:DetectDocumentText",
          "textract:StartDocumentTextDetection",
          "textract:GetDocumentTextDetection",
        ],
        resources: ["*"],
      })
    );

    summarizerLambda.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["secretsmanager:GetSecretValue"],
        resources: [
          `arn:aws:secretsmanager:${this.region}:${this.account}:secret:/document-summarizer/*`,
        ],
      })
    );

    summarizerLambda.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ["ssm:GetParameter"],
        resources: [
          `arn:aws:ssm:${this.region}:${this.account}:parameter/document-summarizer/*`,
        ],
      })
    );

    // S3 suffix filters are case sensitive
    for (const suffix of SUPPORTED_EXTENSIONS) {
      for (const variant of [suffix, suffix.toUpperCase()]) {
        documentBucket.addEventNotification(
          s3.EventType.OBJECT_CREATED,
          new s3n.LambdaDestination(summarizerLambda),
          { suffix: variant }
        );
      }
    }

    new LambdaAlarms(this, "DocumentSummarizerAlarms", {
      function: summarizerLambda,
      snsTopicAlarm: alarmTopic,
    });

    new cdk.CfnOutput(this, "DocumentBucketName", { value: documentBucket.bucketName });
  }
}
