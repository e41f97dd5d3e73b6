import * as fs from 'fs';
import * as path from 'path';
import * as sinon from 'sinon';
import { diffSnapshots, ProjectSnapshotReader } from './projectSnapshotReader';
import { Project } from '../core/Project';
import { logger } from '../core/logger';
import { RestoreInfoBuilder } from '../services/restoreInfoBuilder';

jest.mock('../core/logger', () => {
    const log = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn()
    };
    return { logger: jest.fn(() => log) };
});

const appProject = `<Project Sdk="Microsoft.NET.Sdk">
  <PropertyGroup>
    <TargetFramework>net8.0</TargetFramework>
  </PropertyGroup>
  <ItemGroup>
    <PackageReference Include="Serilog" Version="3.1.1" />
    <PackageReference Include="Dapper" Version="2.1.28" />
  </ItemGroup>
</Project>`;

describe('ProjectSnapshotReader', () => {
    const fixturesPath = path.join(__dirname, '..', '__fixtures__', 'restore-projects');
    const appPath = path.join(fixturesPath, 'App', 'App.csproj');
    const libPath = path.join(fixturesPath, 'Lib', 'Lib.csproj');
    const log = logger('test');
    let reader: ProjectSnapshotReader;

    beforeEach(() => {
        jest.clearAllMocks();
        reader = new ProjectSnapshotReader({ extensionsDirectory: 'obj' });
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('readUpdates', () => {
        it('should read a single-targeting project without a framework dimension', async () => {
            const snapshot = await reader.readUpdates(appPath);

            expect(snapshot.version).toBe(1);
            expect(snapshot.updates).toHaveLength(1);

            const update = snapshot.updates[0].value;
            expect(update.projectConfiguration.name).toBe('Debug|AnyCPU');
            expect(update.projectConfiguration.dimensions.has('TargetFramework')).toBe(false);

            const restore = update.projectChanges.get('NuGetRestore')!.after;
            expect([...restore.properties]).toEqual([
                ['TargetFramework', 'net8.0'],
                ['RestorePackagesWithLockFile', 'true'],
                ['MSBuildProjectExtensionsPath', path.join(fixturesPath, 'App', 'obj') + '/']
            ]);
        });

        it('should read item metadata from attributes and child elements', async () => {
            const snapshot = await reader.readUpdates(appPath);
            const update = snapshot.updates[0].value;

            const packages = update.projectChanges.get('PackageReference')!.after.items;
            expect([...packages.keys()]).toEqual(['Serilog', 'Serilog.Sinks.Console']);
            expect([...packages.get('Serilog')!]).toEqual([['Version', '3.1.1']]);
            expect([...packages.get('Serilog.Sinks.Console')!]).toEqual([['Version', '5.0.1'], ['PrivateAssets', 'all']]);

            const projects = update.projectChanges.get('ProjectReference')!.after.items;
            expect(projects.get('..\\Lib\\Lib.csproj')!.get('DefiningProjectDirectory')).toBe(path.join(fixturesPath, 'App') + '/');

            const tools = update.projectChanges.get('DotNetCliToolReference')!.after.items;
            expect(tools.get('dotnet-ef')!.get('Version')).toBe('2.0.3');
        });

        it('should apply the conditions of child metadata elements', async () => {
            sinon.stub(fs.promises, 'readFile').resolves(`<Project Sdk="Microsoft.NET.Sdk">
  <PropertyGroup><TargetFrameworks>net6.0;net8.0</TargetFrameworks></PropertyGroup>
  <ItemGroup>
    <PackageReference Include="Serilog">
      <Version Condition="'$(TargetFramework)' == 'net6.0'">2.12.0</Version>
      <Version Condition="'$(TargetFramework)' == 'net8.0'">3.1.1</Version>
      <PrivateAssets Condition="'$(TargetFramework)' == 'net6.0'">all</PrivateAssets>
    </PackageReference>
  </ItemGroup>
</Project>`);

            const snapshot = await reader.readUpdates('/repo/Multi/Multi.csproj');
            const [net6, net8] = snapshot.updates.map(update => update.value.projectChanges.get('PackageReference')!.after.items);

            expect([...net6.get('Serilog')!]).toEqual([['Version', '2.12.0'], ['PrivateAssets', 'all']]);
            expect([...net8.get('Serilog')!]).toEqual([['Version', '3.1.1']]);
        });

        it('should read one configuration per framework of a multi-targeting project', async () => {
            const snapshot = await reader.readUpdates(libPath);

            expect(snapshot.updates.map(update => update.value.projectConfiguration.name))
                .toEqual(['Debug|AnyCPU|net6.0', 'Debug|AnyCPU|net8.0']);
            expect(snapshot.updates[1].value.projectConfiguration.dimensions.get('TargetFramework')).toBe('net8.0');

            const net6 = snapshot.updates[0].value;
            expect([...net6.projectChanges.get('NuGetRestore')!.after.properties.keys()]).toEqual([
                'TargetFrameworks',
                'TargetFramework',
                'RuntimeIdentifiers',
                'PackageId',
                'Version',
                'MSBuildProjectExtensionsPath'
            ]);
            expect(net6.projectChanges.get('NuGetRestore')!.after.properties.get('PackageId')).toBe('Contoso.Lib');
            expect([...net6.projectChanges.get('PackageReference')!.after.items.keys()])
                .toEqual(['Newtonsoft.Json', 'System.Text.Json']);

            const net8 = snapshot.updates[1].value;
            expect(net8.projectChanges.get('NuGetRestore')!.after.properties.has('RuntimeIdentifiers')).toBe(false);
            expect([...net8.projectChanges.get('PackageReference')!.after.items.keys()]).toEqual(['Newtonsoft.Json']);
        });

        it('should skip groups with unsupported conditions', async () => {
            const snapshot = await reader.readUpdates(libPath);

            for (const update of snapshot.updates) {
                expect(update.value.projectChanges.get('PackageReference')!.after.items.has('Legacy.Package')).toBe(false);
            }
            expect(log.debug).toHaveBeenCalledWith("Unsupported condition ignored: Exists('legacy.props')");
        });

        it('should report everything as added on a first read', async () => {
            const snapshot = await reader.readUpdates(appPath);
            const packages = snapshot.updates[0].value.projectChanges.get('PackageReference')!;

            expect(packages.before.items.size).toBe(0);
            expect(packages.difference.anyChanges).toBe(true);
            expect([...packages.difference.addedItems]).toEqual(['Serilog', 'Serilog.Sinks.Console']);
        });

        it('should report no changes when the project is read again unchanged', async () => {
            const first = await reader.readUpdates(appPath);
            const second = await reader.readUpdates(appPath, first);

            expect(second.version).toBe(2);
            expect(second.updates[0].dataSourceVersions.get('ProjectSnapshotReader')).toBe(2);
            for (const change of second.updates[0].value.projectChanges.values()) {
                expect(change.difference.anyChanges).toBe(false);
            }
        });

        it('should diff against the previous read', async () => {
            const updated = appProject
                .replace('Version="3.1.1"', 'Version="3.1.2"')
                .replace('<PackageReference Include="Dapper" Version="2.1.28" />', '<PackageReference Include="Polly" Version="8.2.0" />');
            const readFile = sinon.stub(fs.promises, 'readFile');
            readFile.onFirstCall().resolves(appProject);
            readFile.onSecondCall().resolves(updated);

            const first = await reader.readUpdates('/repo/App/App.csproj');
            const second = await reader.readUpdates('/repo/App/App.csproj', first);
            const packages = second.updates[0].value.projectChanges.get('PackageReference')!;

            expect([...packages.difference.changedItems]).toEqual(['Serilog']);
            expect([...packages.difference.addedItems]).toEqual(['Polly']);
            expect([...packages.difference.removedItems]).toEqual(['Dapper']);
            expect(second.updates[0].value.projectChanges.get('NuGetRestore')!.difference.anyChanges).toBe(false);
        });

        it('should read a project without frameworks as one configuration', async () => {
            sinon.stub(fs.promises, 'readFile').resolves(
                '<Project Sdk="Microsoft.NET.Sdk"><PropertyGroup><OutputType>Exe</OutputType></PropertyGroup></Project>'
            );

            const snapshot = await reader.readUpdates('/repo/Empty/Empty.csproj');

            expect(snapshot.updates).toHaveLength(1);
            expect([...snapshot.updates[0].value.projectChanges.get('NuGetRestore')!.after.properties])
                .toEqual([['MSBuildProjectExtensionsPath', '/repo/Empty/obj/']]);
        });

        it.each(['<Project />', '<Project></Project>'])('should read the empty project %s', async content => {
            sinon.stub(fs.promises, 'readFile').resolves(content);

            const snapshot = await reader.readUpdates('/repo/Empty/Empty.csproj');

            expect(snapshot.updates).toHaveLength(1);
            expect(snapshot.updates[0].value.projectConfiguration.name).toBe('Debug|AnyCPU');
            expect([...snapshot.updates[0].value.projectChanges.get('NuGetRestore')!.after.properties])
                .toEqual([['MSBuildProjectExtensionsPath', '/repo/Empty/obj/']]);
        });

        it('should reject when the project file is missing', async () => {
            await expect(reader.readUpdates(path.join(fixturesPath, 'Missing', 'Missing.csproj')))
                .rejects.toThrow('Failed to read project snapshot: ENOENT');
            expect(log.error).toHaveBeenCalledTimes(1);
        });

        it('should reject malformed project files', async () => {
            sinon.stub(fs.promises, 'readFile').resolves('<Project><PropertyGroup></Project>');

            await expect(reader.readUpdates('/repo/Broken/Broken.csproj'))
                .rejects.toThrow('Failed to read project snapshot');
        });

        it('should reject files without a Project element', async () => {
            sinon.stub(fs.promises, 'readFile').resolves('<Solution><Item>x</Item></Solution>');

            await expect(reader.readUpdates('/repo/Other/Other.csproj'))
                .rejects.toThrow("Failed to read project snapshot: '/repo/Other/Other.csproj' has no Project element");
        });
    });

    describe('with RestoreInfoBuilder', () => {
        it('should nominate a single-targeting project', async () => {
            const snapshot = await reader.readUpdates(appPath);

            const info = RestoreInfoBuilder.build(snapshot.updates, new Project(appPath));

            expect(info!.baseIntermediatePath).toBe(path.join(fixturesPath, 'App', 'obj') + '/');
            expect(info!.originalTargetFrameworks).toBeUndefined();
            expect(info!.targetFrameworks.names()).toEqual(['net8.0']);
            expect(info!.toolReferences.names()).toEqual(['dotnet-ef']);

            const reference = info!.targetFrameworks.get('net8.0')!.projectReferences.get('..\\Lib\\Lib.csproj')!;
            expect(reference.properties.get('ProjectFileFullPath')!.value).toBe(libPath);
        });

        it('should nominate every framework of a multi-targeting project', async () => {
            const snapshot = await reader.readUpdates(libPath);

            const info = RestoreInfoBuilder.build(snapshot.updates, new Project(libPath));

            expect(info!.originalTargetFrameworks).toBe('net6.0;net8.0');
            expect(info!.targetFrameworks.names()).toEqual(['net6.0', 'net8.0']);
        });

        it('should not nominate when nothing changed since the previous read', async () => {
            const first = await reader.readUpdates(libPath);
            const second = await reader.readUpdates(libPath, first);

            expect(RestoreInfoBuilder.build(second.updates, new Project(libPath))).toBeUndefined();
        });

        it('should not nominate a project without frameworks', async () => {
            sinon.stub(fs.promises, 'readFile').resolves('<Project Sdk="Microsoft.NET.Sdk"><PropertyGroup /></Project>');

            const snapshot = await reader.readUpdates('/repo/Empty/Empty.csproj');

            expect(RestoreInfoBuilder.build(snapshot.updates, new Project('/repo/Empty/Empty.csproj'))).toBeUndefined();
        });
    });

    describe('diffSnapshots', () => {
        it('should report changed and removed properties', () => {
            const diff = diffSnapshots(
                { ruleName: 'NuGetRestore', properties: new Map([['Version', '1.0.0'], ['PackageId', 'A']]), items: new Map() },
                { ruleName: 'NuGetRestore', properties: new Map([['Version', '1.1.0']]), items: new Map() }
            );

            expect(diff.anyChanges).toBe(true);
            expect([...diff.changedProperties]).toEqual(['Version', 'PackageId']);
        });
    });
});
