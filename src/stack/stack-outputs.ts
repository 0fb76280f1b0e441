import * as Pulumi from "@pulumi/pulumi";


/**
 * Published as the stack outputs, so the keys are the output names.
 */
export interface StackOutputs
{
    vpc_id: Pulumi.Output<string>;
    subnet_ids: ReadonlyArray<Pulumi.Output<string>>;
    bucket_name: Pulumi.Output<string>;
    bucket_arn: Pulumi.Output<string>;
    bucket_website_endpoint?: Pulumi.Output<string>;
    asg_name: Pulumi.Output<string>;
    db_endpoint: Pulumi.Output<string>;
    alb_dns_name: Pulumi.Output<string>;
    bastion_public_ip?: Pulumi.Output<string>;
}
