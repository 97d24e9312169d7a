import * as cdk from "aws-cdk-lib";
import * as cloudwatch from "aws-cdk-lib/aws-cloudwatch";
import * as cwactions from "aws-cdk-lib/aws-cloudwatch-actions";
import * as lambda from "aws-cdk-lib/aws-lambda";
import type * as sns from "aws-cdk-lib/aws-sns";
import * as constructs from "constructs";

export interface LambdaAlarmsProps {
  readonly function: lambda.Function;
  readonly snsTopicAlarm: sns.ITopic;
  /** Errors per period above which the alarm fires */
  readonly errorThreshold?: number;
  readonly periodMinutes?: number;
  /** Share of the function timeout that p99 duration may reach */
  readonly durationPercentThreshold?: number;
}

/**
 * Error and duration alarms for a summarizer Lambda.
 * Duration matters here because text detection polling can run close to the timeout.
 */
export class LambdaAlarms extends constructs.Construct {
  constructor(scope: constructs.Construct, id: string, props: LambdaAlarmsProps) {
    super(scope, id);

    const period = cdk.Duration.minutes(props.periodMinutes ?? 5);
    const action = new cwactions.SnsAction(props.snsTopicAlarm);

    const errorsAlarm = props.function.metricErrors({ period }).createAlarm(this, "ErrorsAlarm", {
      threshold: props.errorThreshold ?? 0,
      comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
      evaluationPeriods: 1,
      alarmDescription: `Summarizer errors over ${props.errorThreshold ?? 0}`,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
    });

    const cfnFunction = props.function.node.defaultChild;
    const timeoutSec =
      cfnFunction instanceof lambda.CfnFunction && typeof cfnFunction.timeout === "number"
        ? cfnFunction.timeout
        : 3;
    const percent = props.durationPercentThreshold ?? 80;
    const thresholdSec = Math.floor((percent / 100) * timeoutSec);

    const durationAlarm = props.function
      .metricDuration({ period, statistic: "p99", label: "p99" })
      .createAlarm(this, "DurationAlarm", {
        threshold: thresholdSec * 1000,
        comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_THRESHOLD,
        evaluationPeriods: 1,
        alarmDescription: `p99 duration >= ${thresholdSec}s (${percent}% of timeout)`,
        treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      });

    for (const alarm of [errorsAlarm, durationAlarm]) {
      alarm.addAlarmAction(action);
      alarm.addOkAction(action);
    }
  }
}
