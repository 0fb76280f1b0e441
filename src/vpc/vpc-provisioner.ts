import { given } from "@nivinjoseph/n-defensive";
import { TypeHelper } from "@nivinjoseph/n-util";
import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import { StackConfig } from "../stack-config.js";
import { VpcAz } from "./vpc-az.js";
import type { VpcConfig } from "./vpc-config.js";
import type { VpcDetails } from "./vpc-details.js";
import type { VpcSubnetConfig } from "./vpc-subnet-config.js";


export class VpcProvisioner
{
    private readonly _name: string;
    private readonly _config: VpcConfig;
    private readonly _region: aws.Region;
    private readonly _resourceOptions: Pulumi.CustomResourceOptions;


    public constructor(name: string, config: VpcConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        name = name.trim();
        if (!name.endsWith("-vpc"))
            name += "-vpc";

        given(name, "name").ensure(t => t.length <= 25, "name is too long");
        this._name = name;

        given(config, "config").ensureHasValue()
            .ensureHasStructure({
                cidr16Bits: "string",
                "region?": "string",
                subnets: [{
                    name: "string",
                    type: "string",
                    cidrOctet3: "number",
                    az: "string"
                }],
                "provider?": "object"
            })
            .ensure(t => t.subnets.isNotEmpty, "at least 1 subnet must be provided")
            .ensure(t => t.subnets.distinct(u => u.name).length === t.subnets.length, "subnet name must be unique")
            .ensure(t => t.subnets.distinct(u => u.cidrOctet3).length === t.subnets.length, "subnet cidrOctet3 must be unique");
        const { cidr16Bits } = config;
        given(cidr16Bits, "config.cidr16Bits")
            .ensure(t => t.split(".").length === 2, "provide only the first 2 octets")
            .ensure(t => t.split(".").takeFirst() === "10", "first octet must be 10")
            .ensure(t => t.split(".").takeLast().length <= 3, "second octet must be a valid ipv4 octet")
            .ensure(t =>
            {
                const secondOctet = TypeHelper.parseNumber(t.split(".").takeLast());
                return secondOctet != null && Number.isInteger(secondOctet) && secondOctet >= 0 && secondOctet <= 255;

            }, "second octet must be a whole number between 0 and 255 inclusive");
        config.subnets.forEach(subnet => this._validateSubnet(subnet));
        this._config = config;
        this._region = config.region ?? StackConfig.awsRegion;

        this._resourceOptions = { provider: config.provider };
    }


    public provision(): VpcDetails
    {
        const cidrBlock = `${this._config.cidr16Bits}.0.0/16`;
        let vpc: aws.ec2.Vpc;
        try
        {
            vpc = new aws.ec2.Vpc(this._name, {
                cidrBlock,
                enableDnsHostnames: true,
                enableDnsSupport: true,
                tags: {
                    ...StackConfig.tags,
                    Name: this._name
                }
            }, this._resourceOptions);

            StackConfig.logger.logInfo(`Created VPC: ${this._name}`);
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create VPC ${this._name}`, e);
            throw e;
        }

        const subnets = this._config.subnets.map(t => this._createSubnet(vpc, t));

        const publicSubnets = subnets.filter((_, index) => this._config.subnets[index].type === "public");
        if (publicSubnets.isNotEmpty)
            this._provisionPublicRouting(vpc, publicSubnets);

        return {
            vpcId: vpc.id,
            cidrBlock,
            subnetIds: subnets.map(t => t.id)
        };
    }

    private _validateSubnet(subnet: VpcSubnetConfig): void
    {
        given(subnet.name, "subnet.name").ensure(t => t.trim().length > 0, "subnet name cannot be blank");

        given(subnet.type, "subnet.type").ensure(t => ["public", "private"].contains(t), "subnet type must be public or private");

        given(subnet.cidrOctet3, "subnet.cidrOctet3").ensure(t => Number.isInteger(t) && t > 0 && t <= 250,
            "cidrOctet3 must be a whole number between 1 and 250 inclusive");

        given(subnet.az, "subnet.az").ensureIsEnum(VpcAz);
    }

    private _createSubnet(vpc: aws.ec2.Vpc, config: VpcSubnetConfig): aws.ec2.Subnet
    {
        const name = config.name.trim();

        try
        {
            const subnet = new aws.ec2.Subnet(name, {
                vpcId: vpc.id,
                cidrBlock: `${this._config.cidr16Bits}.${config.cidrOctet3}.0/24`,
                availabilityZone: `${this._region}${config.az}`,
                mapPublicIpOnLaunch: config.type === "public",
                assignIpv6AddressOnCreation: false,
                tags: {
                    ...StackConfig.tags,
                    Name: name
                }
            }, this._resourceOptions);

            StackConfig.logger.logInfo(`Created subnet: ${name}`);

            return subnet;
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create subnet ${name}`, e);
            throw e;
        }
    }

    private _provisionPublicRouting(vpc: aws.ec2.Vpc, publicSubnets: ReadonlyArray<aws.ec2.Subnet>): void
    {
        const igwName = `${this._name}-igw`;
        try
        {
            const igw = new aws.ec2.InternetGateway(igwName, {
                vpcId: vpc.id,
                tags: {
                    ...StackConfig.tags,
                    Name: igwName
                }
            }, this._resourceOptions);

            const routeTableName = `${this._name}-public-rt`;
            const routeTable = new aws.ec2.RouteTable(routeTableName, {
                vpcId: vpc.id,
                routes: [{
                    cidrBlock: "0.0.0.0/0",
                    gatewayId: igw.id
                }],
                tags: {
                    ...StackConfig.tags,
                    Name: routeTableName
                }
            }, this._resourceOptions);

            publicSubnets.forEach((subnet, index) =>
            {
                new aws.ec2.RouteTableAssociation(`${routeTableName}-asc-${index + 1}`, {
                    subnetId: subnet.id,
                    routeTableId: routeTable.id
                }, this._resourceOptions);
            });

            StackConfig.logger.logInfo(`Created internet gateway: ${igwName}`);
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create internet gateway ${igwName}`, e);
            throw e;
        }
    }
}
