import * as aws from "@pulumi/aws";


export type PolicyDocument = aws.iam.PolicyDocument;
